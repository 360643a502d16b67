import { BackgroundTaskScheduler } from '../backgroundTasks.js';
import { InMemoryPersistenceStore } from '../../services/memoryStore.js';
import type { CommandServices } from '../../tools/commandRegistry.js';
import type {
  BusyInterval,
  CalendarEvent,
  CalendarProvider,
  NewsHeadlines,
  NewsProvider,
  SpeechOutputSink,
  TimeRange,
  WeatherProvider,
  WeatherReport,
} from '../../types/index.js';

// 테스트 공용 in-process 대역

export const FIXED_NOW = new Date('2024-06-03T10:00:00.000Z');

export class FakeWeather implements WeatherProvider {
  readonly calls: string[] = [];

  constructor(
    readonly configured: boolean,
    private readonly outcome: WeatherReport | Error = new Error('no weather configured')
  ) {}

  async getCurrentWeather(location: string): Promise<WeatherReport> {
    this.calls.push(location);
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

export class FakeNews implements NewsProvider {
  constructor(
    readonly configured: boolean,
    private readonly headlines: string[] = []
  ) {}

  async getTopHeadlines(category: string): Promise<NewsHeadlines> {
    return { category, headlines: this.headlines, totalResults: this.headlines.length };
  }
}

export class FakeCalendar implements CalendarProvider {
  readonly freeBusyCalls: Array<{ participantIds: string[]; window: TimeRange }> = [];
  readonly listEventsCalls: TimeRange[] = [];

  constructor(
    private readonly busy: Record<string, BusyInterval[]> = {},
    private readonly events: CalendarEvent[] = []
  ) {}

  async listEvents(window: TimeRange): Promise<CalendarEvent[]> {
    this.listEventsCalls.push(window);
    return this.events.filter(event => !event.start || (event.start < window.end && (event.end ?? event.start) > window.start));
  }

  async freeBusy(participantIds: string[], window: TimeRange): Promise<Record<string, BusyInterval[]>> {
    this.freeBusyCalls.push({ participantIds, window });
    return Object.fromEntries(participantIds.map(id => [id, this.busy[id] ?? []]));
  }
}

/**
 * verify()는 failures번 실패한 뒤 성공. spoken/released로 호출 기록
 */
export class FakeSink implements SpeechOutputSink {
  readonly spoken: string[] = [];
  verifyCalls = 0;
  releaseCalls = 0;
  private gate: Promise<void> | null = null;

  constructor(private failures = 0) {}

  /** 다음 verify()가 release될 때까지 대기 */
  holdVerify(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>(resolve => {
      release = resolve;
    });
    return release;
  }

  async verify(): Promise<void> {
    this.verifyCalls++;
    if (this.gate) {
      await this.gate;
      this.gate = null;
    }
    if (this.failures > 0) {
      this.failures--;
      throw new Error('voice service unavailable');
    }
  }

  async speak(text: string): Promise<boolean> {
    if (this.releaseCalls > 0) return false;
    this.spoken.push(text);
    return true;
  }

  async release(): Promise<void> {
    this.releaseCalls++;
  }
}

export const pickFirst = <T>(items: readonly T[]): T => items[0];

export interface TestServices extends CommandServices {
  store: InMemoryPersistenceStore;
}

export function createTestServices(overrides: Partial<TestServices> = {}): TestServices {
  const store = overrides.store ?? new InMemoryPersistenceStore();
  const now = overrides.now ?? (() => new Date(FIXED_NOW));
  return {
    weather: new FakeWeather(false),
    news: new FakeNews(false),
    calendar: new FakeCalendar(),
    tasks: new BackgroundTaskScheduler({ store, now }),
    pick: pickFirst,
    ...overrides,
    store,
    now,
  };
}

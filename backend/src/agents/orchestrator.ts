import createDebug from 'debug';
import { env } from '../config/env.js';
import { ValidationError, describeError, isAssistantError } from '../errors.js';
import { createCalendarProvider, createSpeechSink, getNewsMCP } from '../mcp/index.js';
import { createPersistenceStore } from '../services/database.js';
import { createWeatherProvider } from '../services/weather.js';
import { initializeCommands, randomPick } from '../tools/index.js';
import type { CommandMetadata, CommandRegistry } from '../tools/commandRegistry.js';
import type {
  AuditPage,
  CalendarEvent,
  CalendarProvider,
  CommandResult,
  ErrorKind,
  FreeSlot,
  NewsProvider,
  PersistenceStore,
  Reminder,
  SessionStatus,
  SpeechOutputSink,
  Timer,
  UtteranceResult,
  WeatherProvider,
} from '../types/index.js';
import * as agenda from './agenda.js';
import { BackgroundTaskScheduler } from './backgroundTasks.js';
import { CommandProcessor, type CommandData } from './commandProcessor.js';
import { CommandRouter } from './commandRouter.js';
import { RetryPolicy } from './retryPolicy.js';
import { findMeetingSlots, type NoSlots } from './schedulingEngine.js';
import { SessionController } from './sessionController.js';

const debug = createDebug('voicedesk:orchestrator');

export interface OrchestratorDependencies {
  calendar: CalendarProvider;
  store: PersistenceStore;
  weather: WeatherProvider;
  news: NewsProvider;
  createSink: () => SpeechOutputSink;
  registry: CommandRegistry;
  retryPolicy: RetryPolicy;
  inactivityMs: number;
  workHourStart?: number;
  workHourEnd?: number;
  timeZone?: string;
  pick?: <T>(items: readonly T[]) => T;
  now?: () => Date;
}

export interface StartSessionResult {
  status: SessionStatus;
  error?: { kind: ErrorKind; message: string };
}

/**
 * Assistant Orchestrator
 * 역할: 세션, 명령, 캘린더 기능을 하나로 묶어 HTTP 계층에 제공
 */
export class AssistantOrchestrator {
  readonly sessions: SessionController;
  readonly processor: CommandProcessor;
  readonly router: CommandRouter;
  readonly tasks: BackgroundTaskScheduler;

  private readonly calendar: CalendarProvider;
  private readonly store: PersistenceStore;
  private readonly workHourStart: number;
  private readonly workHourEnd: number;
  private readonly now: () => Date;

  constructor(deps: OrchestratorDependencies) {
    this.calendar = deps.calendar;
    this.store = deps.store;
    this.workHourStart = deps.workHourStart ?? 9;
    this.workHourEnd = deps.workHourEnd ?? 17;
    this.now = deps.now ?? (() => new Date());

    this.tasks = new BackgroundTaskScheduler({
      store: deps.store,
      now: this.now,
      onTimerFinished: timer => this.announce(timer.ownerId, `Timer '${timer.name}' is done.`),
      onReminderTriggered: reminder => this.announce(reminder.ownerId, `Reminder: ${reminder.text}`),
    });

    this.processor = new CommandProcessor(deps.registry, {
      weather: deps.weather,
      news: deps.news,
      calendar: deps.calendar,
      store: deps.store,
      tasks: this.tasks,
      pick: deps.pick ?? randomPick,
      now: this.now,
      timeZone: deps.timeZone,
    });

    this.router = new CommandRouter(this.processor);

    this.sessions = new SessionController({
      router: this.router,
      store: deps.store,
      createSink: deps.createSink,
      retryPolicy: deps.retryPolicy,
      inactivityMs: deps.inactivityMs,
      now: this.now,
    });
  }

  // 타이머/리마인더 알림은 활성 세션이 있을 때만 음성으로 전달
  private async announce(ownerId: string | null, text: string): Promise<void> {
    if (!ownerId) return;
    await this.sessions.notify(ownerId, text);
  }

  // ==============================================
  // Voice session
  // ==============================================

  async startSession(ownerId: string): Promise<StartSessionResult> {
    try {
      const status = await this.sessions.start(ownerId);
      return { status };
    } catch (error) {
      if (!isAssistantError(error)) throw error;
      return {
        status: this.sessions.getStatus(ownerId),
        error: { kind: error.kind, message: error.userMessage },
      };
    }
  }

  async stopSession(ownerId: string): Promise<{ status: SessionStatus }> {
    const status = await this.sessions.stop(ownerId);
    return { status };
  }

  getSessionStatus(ownerId: string): SessionStatus {
    return this.sessions.getStatus(ownerId);
  }

  handleUtterance(ownerId: string, text: string): Promise<UtteranceResult> {
    return this.sessions.handleUtterance(ownerId, text);
  }

  // ==============================================
  // Commands
  // ==============================================

  processCommand(name: string, params: unknown, ownerId?: string): Promise<CommandResult<CommandData>> {
    return this.processor.process(name, params, { ownerId });
  }

  routeAndProcess(utterance: string, ownerId?: string): Promise<CommandResult<CommandData> | null> {
    return this.router.routeAndProcess(utterance, { ownerId });
  }

  listCommands(): CommandMetadata[] {
    return this.processor.listCommands();
  }

  getActiveTimers(ownerId: string): Timer[] {
    return this.tasks.getActiveTimers(ownerId);
  }

  async dismissReminder(ownerId: string, reminderId: string): Promise<Reminder> {
    const reminder = await this.store.getReminder(reminderId);
    if (!reminder || reminder.ownerId !== ownerId) {
      throw new ValidationError(`Reminder ${reminderId} not found for owner ${ownerId}`, "I couldn't find that reminder.");
    }

    const dismissed = await this.store.dismissReminder(reminderId);
    if (!dismissed) {
      throw new ValidationError(`Reminder ${reminderId} disappeared while dismissing`, "I couldn't find that reminder.");
    }
    debug('Reminder %s dismissed by %s', reminderId, ownerId);
    return dismissed;
  }

  // ==============================================
  // Calendar
  // ==============================================

  /**
   * 참가자 전원이 비어 있는 회의 슬롯. 'primary' 캘린더는 항상 포함
   */
  async findMeetingSlots(durationMinutes: number, participantIds: string[], days: number): Promise<FreeSlot[] | NoSlots> {
    const participants = Array.from(new Set([...participantIds.map(id => id.trim()).filter(Boolean), 'primary']));
    const from = this.now();
    const window = { start: agenda.startOfDay(from), end: agenda.addDays(agenda.startOfDay(from), days) };

    debug('findMeetingSlots %d min for %o over %d day(s)', durationMinutes, participants, days);
    const busy = await this.calendar.freeBusy(participants, window);

    return findMeetingSlots(durationMinutes, busy, days, {
      workHourStart: this.workHourStart,
      workHourEnd: this.workHourEnd,
      from,
    });
  }

  /**
   * 하루 중 60분 넘는 빈 시간. 오늘이면 현재 시각부터 계산
   */
  getFreeTime(ownerId: string, day: Date): Promise<FreeSlot[]> {
    debug('getFreeTime for %s on %s', ownerId, day.toDateString());
    return agenda.getFreeTime(this.calendar, this.now(), day);
  }

  getTodaySchedule(): Promise<CalendarEvent[]> {
    return agenda.getTodaySchedule(this.calendar, this.now());
  }

  getUpcomingEvents(days: number): Promise<CalendarEvent[]> {
    return agenda.getUpcomingEvents(this.calendar, this.now(), days);
  }

  getNextMeeting(): Promise<CalendarEvent | null> {
    return agenda.getNextMeeting(this.calendar, this.now());
  }

  // ==============================================
  // Audit log
  // ==============================================

  getAuditLog(ownerId: string, page: number, perPage: number): Promise<AuditPage> {
    return this.store.getAuditLog(ownerId, { page, perPage });
  }

  // ==============================================
  // Lifecycle
  // ==============================================

  async shutdown(): Promise<void> {
    try {
      await this.sessions.shutdown();
    } catch (error) {
      console.error('[Orchestrator] Failed to stop sessions:', describeError(error));
    }
    await this.tasks.shutdown();
  }
}

/**
 * 환경 변수 기반으로 모든 협력자를 생성
 */
export function createOrchestrator(): AssistantOrchestrator {
  return new AssistantOrchestrator({
    calendar: createCalendarProvider(),
    store: createPersistenceStore(),
    weather: createWeatherProvider(),
    news: getNewsMCP(),
    createSink: createSpeechSink,
    registry: initializeCommands(),
    retryPolicy: new RetryPolicy({
      maxAttempts: env.SESSION_MAX_RETRIES,
      delayMs: env.SESSION_RETRY_DELAY_MS,
    }),
    inactivityMs: env.SESSION_INACTIVITY_MS,
    workHourStart: env.WORK_HOUR_START,
    workHourEnd: env.WORK_HOUR_END,
    timeZone: env.GOOGLE_TIME_ZONE,
  });
}

// ==============================================
// VoiceDesk Backend Types
// ==============================================

// ==============================================
// Session types
// ==============================================

export type SessionState = 'Idle' | 'Starting' | 'Active' | 'Stopping' | 'Stopped' | 'Failed';

export type StopReason = 'requested' | 'inactivity' | 'farewell' | 'start_failed';

export interface Session {
  id: string;
  ownerId: string;
  state: SessionState;
  startedAt: Date;
  lastActivityAt: Date;
  retryCount: number;
  stoppedAt?: Date;
  stopReason?: StopReason;
}

export interface SessionStatus {
  active: boolean;
  state: SessionState;
  sessionId: string | null;
  startedAt: string | null;
  lastActivityAt: string | null;
  retryCount: number;
}

export interface UtteranceResult {
  reply: string;
  spoken: boolean;
  ended: boolean;
  command: CommandResult | null;
  status: SessionStatus;
}

// ==============================================
// Command types
// ==============================================

export type ErrorKind =
  | 'Validation'
  | 'UnknownCommand'
  | 'ExternalProviderError'
  | 'ConcurrencyConflict'
  | 'RetryExhausted';

export interface CommandResult<T = unknown> {
  success: boolean;
  data: T | null;
  userMessage: string;
  errorKind?: ErrorKind;
  error?: string; // 로그/디버깅용, 음성 출력에는 사용하지 않음
}

export interface CommandContext {
  ownerId?: string;
}

// 라우터가 자유 텍스트에서 뽑아낸 지시
export interface Directive {
  name: string;
  trigger: string;
  rawParameters: string;
  parameters: Record<string, unknown>;
}

// ==============================================
// Timer / Reminder / Note
// ==============================================

export type TimerStatus = 'running' | 'finished' | 'error';

export interface Timer {
  id: string;
  name: string;
  durationSeconds: number;
  startTime: Date;
  endTime: Date;
  ownerId: string | null;
  status: TimerStatus;
  finishedAt?: Date;
}

export interface Reminder {
  id: string;
  ownerId: string;
  text: string;
  remindAt: Date;
  expiresAt: Date;
  triggered: boolean;
  triggeredAt?: Date;
  dismissed: boolean;
  createdAt: Date;
}

export interface Note {
  id: string;
  ownerId: string;
  content: string;
  createdAt: Date;
}

export type AuditLevel = 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL' | 'USER' | 'AGENT';

export interface AuditEntry {
  id: string;
  ownerId: string | null;
  level: AuditLevel;
  message: string;
  source: string;
  extra: Record<string, unknown>;
  createdAt: Date;
}

export interface AuditQuery {
  page: number; // 1부터
  perPage: number;
}

// 최신순
export interface AuditPage {
  entries: AuditEntry[];
  total: number;
  page: number;
  pages: number;
}

// ==============================================
// Scheduling types
// ==============================================

// Half-open [start, end)
export interface TimeRange {
  start: Date;
  end: Date;
}

export type BusyInterval = TimeRange;
export type FreeSlot = TimeRange;

export interface CalendarEvent {
  id?: string;
  summary: string;
  start: Date | null; // 종일 일정은 null
  end: Date | null;
  location?: string;
  allDay: boolean;
}

// ==============================================
// Collaborator interfaces
// ==============================================

export interface CalendarProvider {
  listEvents(window: TimeRange): Promise<CalendarEvent[]>;
  freeBusy(participantIds: string[], window: TimeRange): Promise<Record<string, BusyInterval[]>>;
}

export interface SpeechOutputSink {
  /** Checks credentials and agent identity. Throws when the sink cannot be used. */
  verify(): Promise<void>;
  speak(text: string): Promise<boolean>;
  release(): Promise<void>;
}

export interface PersistenceStore {
  saveNote(note: Note): Promise<Note>;
  getNote(id: string): Promise<Note | null>;
  saveReminder(reminder: Reminder): Promise<Reminder>;
  getReminder(id: string): Promise<Reminder | null>;
  markReminderTriggered(id: string, triggeredAt: Date): Promise<Reminder | null>;
  dismissReminder(id: string): Promise<Reminder | null>;
  appendAudit(entry: Omit<AuditEntry, 'id' | 'createdAt'>): Promise<AuditEntry>;
  getAudit(id: string): Promise<AuditEntry | null>;
  getAuditLog(ownerId: string, query: AuditQuery): Promise<AuditPage>;
}

export interface WeatherReport {
  location: string;
  temperature: string;
  feelsLike: string;
  condition: string;
  humidity: string;
  windSpeed: string;
}

export interface WeatherProvider {
  readonly configured: boolean;
  getCurrentWeather(location: string): Promise<WeatherReport>;
}

export interface NewsHeadlines {
  category: string;
  headlines: string[];
  totalResults: number;
}

export interface NewsProvider {
  readonly configured: boolean;
  getTopHeadlines(category: string): Promise<NewsHeadlines>;
}

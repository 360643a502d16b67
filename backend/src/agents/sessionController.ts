import { randomUUID } from 'crypto';
import createDebug from 'debug';
import { ConcurrencyConflictError, ValidationError, describeError } from '../errors.js';
import type {
  AuditLevel,
  PersistenceStore,
  Session,
  SessionStatus,
  SpeechOutputSink,
  StopReason,
  UtteranceResult,
} from '../types/index.js';
import type { CommandRouter } from './commandRouter.js';
import { RetryPolicy } from './retryPolicy.js';
import { SessionRegistry } from './sessionRegistry.js';

/**
 * Session Controller
 * 역할: 소유자별 음성 세션 시작/종료, 재시도, 비활동 감시, 발화 처리
 *
 *   Idle → Starting → Active | Failed
 *   Starting → Stopping (시작 중 stop)
 *   Active → Stopping → Stopped
 */

const debug = createDebug('voicedesk:session');

export const GREETING =
  "Hello! I'm your AI voice assistant. I can help you with calendar events, weather, news, and much more. " +
  'What would you like me to help you with today?';
export const FAREWELL = 'Goodbye! Have a great day.';
export const FALLBACK_REPLY =
  "I'm here to help! You can ask about your schedule, weather, news, or I can set reminders and timers for you.";

export const FAREWELL_PHRASES: readonly string[] = ['goodbye', 'end chat', "that's all", 'thanks bye', 'see you later'];

export function isFarewell(text: string): boolean {
  const lower = text.toLowerCase();
  return FAREWELL_PHRASES.some(phrase => lower.includes(phrase));
}

export interface SessionControllerOptions {
  router: CommandRouter;
  store: PersistenceStore;
  /** 세션마다 새 sink 생성 */
  createSink: () => SpeechOutputSink;
  retryPolicy: RetryPolicy;
  inactivityMs: number;
  registry?: SessionRegistry;
  now?: () => Date;
}

export class SessionController {
  private readonly router: CommandRouter;
  private readonly store: PersistenceStore;
  private readonly createSink: () => SpeechOutputSink;
  private readonly retryPolicy: RetryPolicy;
  private readonly inactivityMs: number;
  private readonly registry: SessionRegistry;
  private readonly now: () => Date;

  // sessionId 기준
  private sinks = new Map<string, SpeechOutputSink>();
  private watchdogs = new Map<string, NodeJS.Timeout>();
  // ownerId 기준, 진행 중인 stop 공유
  private stopping = new Map<string, Promise<SessionStatus>>();

  constructor(options: SessionControllerOptions) {
    this.router = options.router;
    this.store = options.store;
    this.createSink = options.createSink;
    this.retryPolicy = options.retryPolicy;
    this.inactivityMs = options.inactivityMs;
    this.registry = options.registry ?? new SessionRegistry();
    this.now = options.now ?? (() => new Date());
  }

  // ==============================================
  // Start
  // ==============================================

  /**
   * 세션 시작. 이미 실행 중이면 ConcurrencyConflictError, 재시도 소진 시 RetryExhaustedError.
   * 시작 중에 stop이 들어오면 Stopped 상태를 반환한다.
   */
  async start(ownerId: string): Promise<SessionStatus> {
    const startedAt = this.now();
    const session = this.registry.createIfAbsent(ownerId, () => ({
      id: randomUUID(),
      ownerId,
      state: 'Starting',
      startedAt,
      lastActivityAt: startedAt,
      retryCount: 0,
    }));

    if (!session) {
      console.warn(`[SessionController] Session already running for owner ${ownerId}`);
      throw new ConcurrencyConflictError(ownerId);
    }

    const sink = this.createSink();
    this.sinks.set(session.id, sink);
    debug('Session %s starting for owner %s', session.id, ownerId);

    try {
      await this.retryPolicy.run(
        async attempt => {
          if (!this.isStarting(session)) {
            throw new Error('Session start cancelled');
          }
          debug('Attempt %d/%d to start session %s', attempt, this.retryPolicy.maxAttempts, session.id);
          await sink.verify();
        },
        {
          onFailure: (error, attempt) => {
            if (this.registry.incrementRetry(ownerId, session.id) === null) return;
            console.error(
              `[SessionController] Failed to start voice assistant on attempt ${attempt}:`,
              describeError(error)
            );
          },
          shouldRetry: () => this.isStarting(session),
        }
      );
    } catch (error) {
      if (!this.isStarting(session)) {
        return this.settleCancelledStart(session);
      }

      this.registry.compareAndSwap(ownerId, session.id, 'Starting', 'Failed', {
        stoppedAt: this.now(),
        stopReason: 'start_failed',
      });
      await this.releaseSink(session.id);
      console.error(`[SessionController] All attempts failed to start voice assistant for owner ${ownerId}`);
      await this.audit(
        ownerId,
        'CRITICAL',
        `Voice assistant failed to start after ${this.retryPolicy.maxAttempts} attempts: ${describeError(error)}`,
        { sessionId: session.id }
      );
      throw error;
    }

    if (!this.isStarting(session)) {
      return this.settleCancelledStart(session);
    }

    await sink.speak(GREETING);

    const active = this.registry.compareAndSwap(ownerId, session.id, 'Starting', 'Active', {
      lastActivityAt: this.now(),
    });
    if (!active) {
      return this.settleCancelledStart(session);
    }

    this.armWatchdog(active, this.inactivityMs);
    await this.audit(ownerId, 'INFO', 'Voice assistant started', { sessionId: session.id });
    console.log(`[SessionController] Voice assistant active for owner ${ownerId}`);

    return this.statusOf(session);
  }

  private isStarting(session: Session): boolean {
    return this.registry.find(session.ownerId, session.id)?.state === 'Starting';
  }

  // stop이 이긴 경우: stop 완료를 기다린 뒤 그 세션의 최종 상태 반환
  private async settleCancelledStart(session: Session): Promise<SessionStatus> {
    const inFlight = this.stopping.get(session.ownerId);
    if (inFlight) {
      await inFlight;
    }
    debug('Start of session %s was cancelled by stop', session.id);
    return this.statusOf(session);
  }

  // ==============================================
  // Stop
  // ==============================================

  /**
   * 멱등. 세션이 없거나 이미 종료됐으면 현재 상태를 그대로 반환.
   * 동시에 들어온 stop은 같은 전이를 공유한다.
   */
  stop(ownerId: string, reason: StopReason = 'requested'): Promise<SessionStatus> {
    const inFlight = this.stopping.get(ownerId);
    if (inFlight) return inFlight;

    const session = this.registry.get(ownerId);
    if (!session) {
      return Promise.resolve(this.getStatus(ownerId));
    }

    const stopping = this.registry.compareAndSwap(ownerId, session.id, ['Starting', 'Active'], 'Stopping');
    if (!stopping) {
      return Promise.resolve(this.getStatus(ownerId));
    }

    const transition = this.completeStop(stopping, reason).finally(() => {
      this.stopping.delete(ownerId);
    });
    this.stopping.set(ownerId, transition);
    return transition;
  }

  private async completeStop(session: Session, reason: StopReason): Promise<SessionStatus> {
    this.clearWatchdog(session.id);
    await this.releaseSink(session.id);

    this.registry.compareAndSwap(session.ownerId, session.id, 'Stopping', 'Stopped', {
      stoppedAt: this.now(),
      stopReason: reason,
    });

    console.log(`[SessionController] Voice session ${session.id} stopped (${reason})`);
    await this.audit(session.ownerId, 'INFO', `Voice conversation ended (${reason})`, { sessionId: session.id });

    return this.statusOf(session);
  }

  private async releaseSink(sessionId: string): Promise<void> {
    const sink = this.sinks.get(sessionId);
    if (!sink) return;
    this.sinks.delete(sessionId);

    try {
      await sink.release();
    } catch (error) {
      console.error(`[SessionController] Failed to release speech resource for ${sessionId}:`, describeError(error));
    }
  }

  // ==============================================
  // Watchdog
  // ==============================================

  private armWatchdog(session: Session, delayMs: number): void {
    this.clearWatchdog(session.id);
    const handle = setTimeout(() => this.onWatchdog(session.ownerId, session.id), delayMs);
    this.watchdogs.set(session.id, handle);
  }

  private clearWatchdog(sessionId: string): void {
    const handle = this.watchdogs.get(sessionId);
    if (handle) {
      clearTimeout(handle);
      this.watchdogs.delete(sessionId);
    }
  }

  private onWatchdog(ownerId: string, sessionId: string): void {
    this.watchdogs.delete(sessionId);

    const session = this.registry.get(ownerId);
    if (!session || session.id !== sessionId || session.state !== 'Active') return;

    const idleMs = this.now().getTime() - session.lastActivityAt.getTime();
    if (idleMs < this.inactivityMs) {
      this.armWatchdog(session, this.inactivityMs - idleMs);
      return;
    }

    console.log(`[SessionController] Session ${sessionId} idle for ${Math.round(idleMs / 1000)}s, stopping`);
    this.stop(ownerId, 'inactivity').catch(error => {
      console.error('[SessionController] Inactivity stop failed:', describeError(error));
    });
  }

  // ==============================================
  // Utterances
  // ==============================================

  /**
   * 사용자 발화 처리. 작별 문구면 세션 종료, 아니면 명령 라우팅 후 응답을 말한다.
   */
  async handleUtterance(ownerId: string, text: string): Promise<UtteranceResult> {
    const session = this.registry.get(ownerId);
    if (!session || session.state !== 'Active') {
      throw new ValidationError(
        `No active voice session for owner ${ownerId}`,
        'The voice assistant is not running. Start it first.'
      );
    }

    this.registry.touch(ownerId, session.id, this.now());
    await this.audit(ownerId, 'USER', text, { sessionId: session.id });

    const sink = this.sinks.get(session.id);

    if (isFarewell(text)) {
      const spoken = sink ? await sink.speak(FAREWELL) : false;
      const status = await this.stop(ownerId, 'farewell');
      return { reply: FAREWELL, spoken, ended: true, command: null, status };
    }

    const command = await this.router.routeAndProcess(text, { ownerId });
    const reply = command?.userMessage ?? FALLBACK_REPLY;
    const spoken = sink ? await sink.speak(reply) : false;
    await this.audit(ownerId, 'AGENT', reply, { sessionId: session.id });

    return { reply, spoken, ended: false, command, status: this.getStatus(ownerId) };
  }

  /**
   * 활성 세션이 있으면 알림 문장을 말한다 (활동 시각은 갱신하지 않음)
   */
  async notify(ownerId: string, text: string): Promise<boolean> {
    const session = this.registry.get(ownerId);
    const sink = session?.state === 'Active' ? this.sinks.get(session.id) : undefined;
    if (!sink) {
      debug('No active session to notify owner %s: %s', ownerId, text);
      return false;
    }
    return sink.speak(text);
  }

  // ==============================================
  // Status
  // ==============================================

  getStatus(ownerId: string): SessionStatus {
    const session = this.registry.latest(ownerId);
    if (!session) {
      return {
        active: false,
        state: 'Idle',
        sessionId: null,
        startedAt: null,
        lastActivityAt: null,
        retryCount: 0,
      };
    }
    return toStatus(session);
  }

  private statusOf(session: Session): SessionStatus {
    const latest = this.registry.find(session.ownerId, session.id);
    return toStatus(latest ?? session);
  }

  /** 모든 세션 종료 (프로세스 종료 시) */
  async shutdown(): Promise<void> {
    await Promise.all(this.registry.owners().map(ownerId => this.stop(ownerId)));
  }

  private async audit(ownerId: string, level: AuditLevel, message: string, extra: Record<string, unknown>) {
    try {
      await this.store.appendAudit({ ownerId, level, message, source: 'voice_assistant', extra });
    } catch (error) {
      console.error('[SessionController] Failed to write audit log:', describeError(error));
    }
  }
}

function toStatus(session: Session): SessionStatus {
  return {
    active: session.state === 'Active',
    state: session.state,
    sessionId: session.id,
    startedAt: session.startedAt.toISOString(),
    lastActivityAt: session.lastActivityAt.toISOString(),
    retryCount: session.retryCount,
  };
}

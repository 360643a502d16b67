import { randomUUID } from 'crypto';
import createDebug from 'debug';
import { describeError } from '../errors.js';
import type { PersistenceStore, Reminder, Timer } from '../types/index.js';

/**
 * Background Task Scheduler
 * 역할: 타이머 만료, 리마인더 발동 같은 지연 작업을 호출 경로 밖에서 실행
 */

const debug = createDebug('voicedesk:tasks');

// setTimeout 상한 (2^31-1 ms, 약 24.8일). 넘으면 Node가 1ms로 줄여 즉시 실행됨
export const MAX_TIMEOUT_MS = 2_147_483_647;

// 끝난 타이머는 최근 것만 조회용으로 보관
export const FINISHED_TIMER_HISTORY = 50;

export type BackgroundTask = (signal: AbortSignal) => void | Promise<void>;

export interface BackgroundTaskSchedulerOptions {
  store: PersistenceStore;
  /** 타이머 만료 시 호출. throw하면 타이머는 'error' 상태가 됨 */
  onTimerFinished?: (timer: Timer) => void | Promise<void>;
  onReminderTriggered?: (reminder: Reminder) => void | Promise<void>;
  now?: () => Date;
}

export interface StartTimerInput {
  name: string;
  durationSeconds: number;
  ownerId: string | null;
}

export class BackgroundTaskScheduler {
  private readonly store: PersistenceStore;
  private readonly onTimerFinished?: BackgroundTaskSchedulerOptions['onTimerFinished'];
  private readonly onReminderTriggered?: BackgroundTaskSchedulerOptions['onReminderTriggered'];
  private readonly now: () => Date;

  private readonly timers = new Map<string, Timer>();
  private readonly pending = new Set<NodeJS.Timeout>();
  private readonly running = new Set<Promise<void>>();
  private readonly controller = new AbortController();

  constructor(options: BackgroundTaskSchedulerOptions) {
    this.store = options.store;
    this.onTimerFinished = options.onTimerFinished;
    this.onReminderTriggered = options.onReminderTriggered;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * `delayMs` 뒤에 task를 실행. 호출자는 기다리지 않으며, 실패는 로그만 남김.
   */
  scheduleAfter(delayMs: number, task: BackgroundTask, label: string): void {
    if (this.controller.signal.aborted) {
      console.warn(`[BackgroundTasks] Scheduler is shut down, dropping "${label}"`);
      return;
    }

    this.arm(Math.max(0, delayMs), task, label);
    debug('Scheduled "%s" in %dms', label, delayMs);
  }

  // 상한보다 긴 지연은 setTimeout을 이어 붙여 기다림
  private arm(remainingMs: number, task: BackgroundTask, label: string): void {
    const waitMs = Math.min(remainingMs, MAX_TIMEOUT_MS);
    const handle = setTimeout(() => {
      this.pending.delete(handle);
      if (remainingMs > waitMs) {
        this.arm(remainingMs - waitMs, task, label);
        return;
      }
      const execution = this.execute(task, label);
      this.running.add(execution);
      // execute()는 reject하지 않음
      void execution.finally(() => this.running.delete(execution));
    }, waitMs);
    this.pending.add(handle);
  }

  private async execute(task: BackgroundTask, label: string): Promise<void> {
    try {
      await task(this.controller.signal);
      debug('Task "%s" done', label);
    } catch (error) {
      console.error(`[BackgroundTasks] Task "${label}" failed:`, describeError(error));
    }
  }

  // ==============================================
  // Timers
  // ==============================================

  startTimer(input: StartTimerInput): Timer {
    const startTime = this.now();
    const timer: Timer = {
      id: randomUUID(),
      name: input.name,
      durationSeconds: input.durationSeconds,
      startTime,
      endTime: new Date(startTime.getTime() + input.durationSeconds * 1000),
      ownerId: input.ownerId,
      status: 'running',
    };
    this.timers.set(timer.id, timer);

    this.scheduleAfter(input.durationSeconds * 1000, () => this.finishTimer(timer.id), `timer:${timer.id}`);
    return { ...timer };
  }

  private async finishTimer(timerId: string): Promise<void> {
    const timer = this.timers.get(timerId);
    if (!timer || timer.status !== 'running') return;

    try {
      await this.onTimerFinished?.({ ...timer });
    } catch (error) {
      timer.status = 'error';
      timer.finishedAt = this.now();
      this.pruneTimers();
      console.error(`[BackgroundTasks] Timer "${timer.name}" completion hook failed:`, describeError(error));
      return;
    }

    timer.status = 'finished';
    timer.finishedAt = this.now();
    this.pruneTimers();
    debug('Timer "%s" finished', timer.name);

    await this.audit(timer.ownerId, `Timer completed: ${timer.name}`, { timerId: timer.id });
  }

  // Map은 삽입 순서를 유지하므로 앞쪽이 오래된 타이머
  private pruneTimers(): void {
    const done = Array.from(this.timers.values()).filter(timer => timer.status !== 'running');
    for (const timer of done.slice(0, Math.max(0, done.length - FINISHED_TIMER_HISTORY))) {
      this.timers.delete(timer.id);
    }
  }

  /** 소유자의 실행 중 타이머 (시점 복사본) */
  getActiveTimers(ownerId: string | null): Timer[] {
    return Array.from(this.timers.values())
      .filter(timer => timer.ownerId === ownerId && timer.status === 'running')
      .map(timer => ({ ...timer }));
  }

  getTimer(timerId: string): Timer | null {
    const timer = this.timers.get(timerId);
    return timer ? { ...timer } : null;
  }

  // ==============================================
  // Reminders
  // ==============================================

  scheduleReminder(reminder: Reminder): void {
    const delayMs = reminder.remindAt.getTime() - this.now().getTime();
    this.scheduleAfter(delayMs, () => this.triggerReminder(reminder.id), `reminder:${reminder.id}`);
  }

  private async triggerReminder(reminderId: string): Promise<void> {
    const reminder = await this.store.getReminder(reminderId);
    if (!reminder) {
      console.warn(`[BackgroundTasks] Reminder ${reminderId} no longer exists`);
      return;
    }
    if (reminder.dismissed || reminder.triggered) {
      debug('Reminder %s skipped (dismissed=%s, triggered=%s)', reminderId, reminder.dismissed, reminder.triggered);
      return;
    }

    const triggered = await this.store.markReminderTriggered(reminderId, this.now());
    debug('Reminder triggered: %s', reminder.text);
    await this.audit(reminder.ownerId, `Reminder triggered: Reminder: ${reminder.text}`, { reminderId });

    if (triggered) {
      await this.onReminderTriggered?.(triggered);
    }
  }

  // ==============================================
  // Lifecycle
  // ==============================================

  /** 아직 시작되지 않은 작업 수 */
  pendingCount(): number {
    return this.pending.size;
  }

  /** 실행 중인 작업이 모두 끝날 때까지 대기 */
  async idle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.allSettled(Array.from(this.running));
    }
  }

  /**
   * 대기 중인 작업을 취소하고 실행 중인 작업에 abort 신호를 보낸 뒤 종료를 기다림
   */
  async shutdown(): Promise<void> {
    for (const handle of this.pending) {
      clearTimeout(handle);
    }
    const dropped = this.pending.size;
    this.pending.clear();
    this.controller.abort();
    await this.idle();
    debug('Shut down, %d pending task(s) dropped', dropped);
  }

  private async audit(ownerId: string | null, message: string, extra: Record<string, unknown>): Promise<void> {
    try {
      await this.store.appendAudit({ ownerId, level: 'INFO', message, source: 'background_tasks', extra });
    } catch (error) {
      console.error('[BackgroundTasks] Failed to write audit log:', describeError(error));
    }
  }
}

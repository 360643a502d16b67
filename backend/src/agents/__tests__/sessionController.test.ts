import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CommandProcessor } from '../commandProcessor.js';
import { CommandRouter } from '../commandRouter.js';
import { RetryPolicy } from '../retryPolicy.js';
import { FALLBACK_REPLY, FAREWELL, GREETING, SessionController, isFarewell } from '../sessionController.js';
import { ConcurrencyConflictError, RetryExhaustedError, ValidationError } from '../../errors.js';
import { createCommandRegistry } from '../../tools/builtinCommands.js';
import { FIXED_NOW, FakeSink, createTestServices, type TestServices } from './fakes.js';

const INACTIVITY_MS = 600_000;

describe('SessionController', () => {
  let services: TestServices;
  let sinks: FakeSink[];
  let nextSink: () => FakeSink;
  let controller: SessionController;

  function auditMessages(): string[] {
    return services.store.listAudit().map(entry => entry.message);
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(FIXED_NOW);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    services = createTestServices({ now: () => new Date() });
    sinks = [];
    nextSink = () => new FakeSink();
    controller = new SessionController({
      router: new CommandRouter(new CommandProcessor(createCommandRegistry(), services)),
      store: services.store,
      createSink: () => {
        const sink = nextSink();
        sinks.push(sink);
        return sink;
      },
      retryPolicy: new RetryPolicy({ maxAttempts: 3, delayMs: 5000 }),
      inactivityMs: INACTIVITY_MS,
    });
  });

  afterEach(async () => {
    await controller.shutdown();
    await services.tasks.shutdown();
    vi.useRealTimers();
  });

  describe('start', () => {
    it('activates a session and greets the owner', async () => {
      const status = await controller.start('user-1');

      expect(status.state).toBe('Active');
      expect(status.active).toBe(true);
      expect(status.retryCount).toBe(0);
      expect(status.startedAt).toBe('2024-06-03T10:00:00.000Z');
      expect(sinks[0].spoken).toEqual([GREETING]);
      expect(auditMessages()).toEqual(['Voice assistant started']);
    });

    it('lets exactly one of two concurrent starts win', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      const [first, second] = await Promise.allSettled([controller.start('user-1'), controller.start('user-1')]);

      expect(first.status).toBe('fulfilled');
      expect(second.status).toBe('rejected');
      if (second.status === 'rejected') {
        expect(second.reason).toBeInstanceOf(ConcurrencyConflictError);
      }
      expect(sinks).toHaveLength(1);
      expect(controller.getStatus('user-1').state).toBe('Active');
    });

    it('runs sessions for different owners side by side', async () => {
      await Promise.all([controller.start('user-1'), controller.start('user-2')]);

      expect(controller.getStatus('user-1').state).toBe('Active');
      expect(controller.getStatus('user-2').state).toBe('Active');
    });

    it('retries a failed verification and records the retry count', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      nextSink = () => new FakeSink(1);

      const starting = controller.start('user-1');
      await vi.advanceTimersByTimeAsync(5000);
      const status = await starting;

      expect(status.state).toBe('Active');
      expect(status.retryCount).toBe(1);
      expect(sinks[0].verifyCalls).toBe(2);
      expect(error).toHaveBeenCalledWith(
        '[SessionController] Failed to start voice assistant on attempt 1:',
        'voice service unavailable'
      );
    });

    it('fails after the last attempt and releases the speech resource', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      nextSink = () => new FakeSink(5);

      const outcome = controller.start('user-1').catch((error: unknown) => error);
      await vi.advanceTimersByTimeAsync(10_000);
      const error = await outcome;

      expect(error).toBeInstanceOf(RetryExhaustedError);
      const status = controller.getStatus('user-1');
      expect(status.state).toBe('Failed');
      expect(status.active).toBe(false);
      expect(status.retryCount).toBe(3);
      expect(sinks[0].verifyCalls).toBe(3);
      expect(sinks[0].releaseCalls).toBe(1);

      const critical = services.store.listAudit().filter(entry => entry.level === 'CRITICAL');
      expect(critical.map(entry => entry.message)).toEqual([
        'Voice assistant failed to start after 3 attempts: Gave up after 3 attempts: voice service unavailable',
      ]);
    });

    it('allows a new start after a failed one', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      nextSink = () => new FakeSink(5);
      const failed = controller.start('user-1').catch((error: unknown) => error);
      await vi.advanceTimersByTimeAsync(10_000);
      await failed;

      nextSink = () => new FakeSink();
      const status = await controller.start('user-1');

      expect(status.state).toBe('Active');
      expect(status.retryCount).toBe(0);
    });

    it('returns Stopped when a stop arrives during start', async () => {
      const sink = new FakeSink();
      nextSink = () => sink;
      const releaseVerify = sink.holdVerify();

      const starting = controller.start('user-1');
      const stopped = await controller.stop('user-1');
      releaseVerify();
      const status = await starting;

      expect(stopped.state).toBe('Stopped');
      expect(status.state).toBe('Stopped');
      expect(status.sessionId).toBe(stopped.sessionId);
      expect(sink.spoken).toEqual([]);
      expect(sink.releaseCalls).toBe(1);
    });
  });

  describe('stop', () => {
    it('is idempotent', async () => {
      const started = await controller.start('user-1');

      const first = await controller.stop('user-1');
      const second = await controller.stop('user-1');

      expect(first.state).toBe('Stopped');
      expect(second).toEqual(first);
      expect(first.sessionId).toBe(started.sessionId);
      expect(sinks[0].releaseCalls).toBe(1);
      expect(auditMessages().filter(m => m.startsWith('Voice conversation ended'))).toEqual([
        'Voice conversation ended (requested)',
      ]);
    });

    it('reports Idle when no session ever ran', async () => {
      const status = await controller.stop('nobody');

      expect(status).toEqual({
        active: false,
        state: 'Idle',
        sessionId: null,
        startedAt: null,
        lastActivityAt: null,
        retryCount: 0,
      });
    });
  });

  describe('inactivity watchdog', () => {
    it('stops a session after the inactivity window', async () => {
      await controller.start('user-1');

      await vi.advanceTimersByTimeAsync(INACTIVITY_MS);
      const status = await controller.stop('user-1');

      expect(status.state).toBe('Stopped');
      expect(auditMessages()).toContain('Voice conversation ended (inactivity)');
      expect(sinks[0].releaseCalls).toBe(1);
    });

    it('pushes the deadline back after activity', async () => {
      await controller.start('user-1');

      await vi.advanceTimersByTimeAsync(INACTIVITY_MS / 2);
      await controller.handleUtterance('user-1', 'Tell me a joke');
      await vi.advanceTimersByTimeAsync(INACTIVITY_MS / 2);
      expect(controller.getStatus('user-1').state).toBe('Active');

      await vi.advanceTimersByTimeAsync(INACTIVITY_MS / 2);
      expect(controller.getStatus('user-1').state).not.toBe('Active');
    });

    it('releases once when a stop races the watchdog', async () => {
      await controller.start('user-1');

      vi.advanceTimersByTime(INACTIVITY_MS);
      const status = await controller.stop('user-1');

      expect(status.state).toBe('Stopped');
      expect(sinks[0].releaseCalls).toBe(1);
      expect(auditMessages().filter(m => m.startsWith('Voice conversation ended'))).toEqual([
        'Voice conversation ended (inactivity)',
      ]);
    });
  });

  describe('handleUtterance', () => {
    it('requires an active session', async () => {
      await expect(controller.handleUtterance('user-1', 'hello')).rejects.toBeInstanceOf(ValidationError);
    });

    it('routes the utterance and speaks the reply', async () => {
      await controller.start('user-1');

      const result = await controller.handleUtterance('user-1', 'calculate 2+2');

      expect(result.reply).toBe('2+2 equals 4');
      expect(result.spoken).toBe(true);
      expect(result.ended).toBe(false);
      expect(result.command?.success).toBe(true);
      expect(sinks[0].spoken).toEqual([GREETING, '2+2 equals 4']);

      const levels = services.store.listAudit().map(entry => entry.level);
      expect(levels).toContain('USER');
      expect(levels).toContain('AGENT');
    });

    it('falls back to the help reply when nothing routes', async () => {
      await controller.start('user-1');

      const result = await controller.handleUtterance('user-1', 'How are you?');

      expect(result.reply).toBe(FALLBACK_REPLY);
      expect(result.command).toBeNull();
    });

    it('ends the session on a farewell', async () => {
      await controller.start('user-1');

      const result = await controller.handleUtterance('user-1', 'Okay, goodbye!');

      expect(result).toMatchObject({ reply: FAREWELL, spoken: true, ended: true, command: null });
      expect(result.status.state).toBe('Stopped');
      expect(sinks[0].spoken).toEqual([GREETING, FAREWELL]);
      expect(auditMessages()).toContain('Voice conversation ended (farewell)');
    });
  });

  describe('notify', () => {
    it('speaks only while a session is active', async () => {
      expect(await controller.notify('user-1', 'Timer done')).toBe(false);

      await controller.start('user-1');
      expect(await controller.notify('user-1', 'Timer done')).toBe(true);
      expect(sinks[0].spoken).toEqual([GREETING, 'Timer done']);
    });
  });
});

describe('isFarewell', () => {
  it('spots farewell phrases anywhere in the text', () => {
    expect(isFarewell("Thanks, that's all for now")).toBe(true);
    expect(isFarewell('SEE YOU LATER')).toBe(true);
    expect(isFarewell('What is the weather?')).toBe(false);
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RetryPolicy } from '../retryPolicy.js';
import { RetryExhaustedError, ValidationError } from '../../errors.js';

describe('RetryPolicy', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns as soon as an attempt succeeds', async () => {
    const policy = new RetryPolicy({ maxAttempts: 3, delayMs: 5000 });
    const failures: number[] = [];
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`attempt ${attempt} failed`);
      return 'connected';
    });

    const outcome = policy.run(operation, { onFailure: (_error, attempt) => failures.push(attempt) });
    await vi.advanceTimersByTimeAsync(10_000);

    await expect(outcome).resolves.toBe('connected');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(failures).toEqual([1, 2]);
  });

  it('waits between attempts', async () => {
    const policy = new RetryPolicy({ maxAttempts: 2, delayMs: 5000 });
    const operation = vi.fn(async (attempt: number) => {
      if (attempt === 1) throw new Error('first attempt failed');
      return attempt;
    });

    const outcome = policy.run(operation);
    await vi.advanceTimersByTimeAsync(4999);
    expect(operation).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    await expect(outcome).resolves.toBe(2);
  });

  it('throws RetryExhaustedError after the last attempt without a trailing wait', async () => {
    const policy = new RetryPolicy({ maxAttempts: 3, delayMs: 5000 });
    const lastError = new Error('still down');
    const operation = vi.fn(async () => {
      throw lastError;
    });

    const outcome = policy.run(operation).catch((error: unknown) => error);
    await vi.advanceTimersByTimeAsync(10_000);
    const error = await outcome;

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (!(error instanceof RetryExhaustedError)) return;
    expect(error.attempts).toBe(3);
    expect(error.kind).toBe('RetryExhausted');
    expect(error.cause).toBe(lastError);
    expect(error.message).toBe('Gave up after 3 attempts: still down');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('stops early when shouldRetry says no', async () => {
    const policy = new RetryPolicy({ maxAttempts: 3, delayMs: 5000 });
    const cancelled = new Error('cancelled');
    const operation = vi.fn(async () => {
      throw cancelled;
    });

    await expect(policy.run(operation, { shouldRetry: () => false })).rejects.toBe(cancelled);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('computes fixed and exponential delays', () => {
    const fixed = new RetryPolicy({ maxAttempts: 3, delayMs: 1000 });
    expect([1, 2, 3].map(n => fixed.delayFor(n))).toEqual([1000, 1000, 1000]);

    const exponential = new RetryPolicy({ maxAttempts: 4, delayMs: 1000, backoff: 'exponential', maxDelayMs: 3000 });
    expect([1, 2, 3].map(n => exponential.delayFor(n))).toEqual([1000, 2000, 3000]);
  });

  it('rejects a non-positive attempt count', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0, delayMs: 1000 })).toThrowError(ValidationError);
  });
});

import { RetryExhaustedError, ValidationError } from '../errors.js';

export type Backoff = 'fixed' | 'exponential';

export interface RetryPolicyOptions {
  maxAttempts: number;
  delayMs: number;
  backoff?: Backoff;
  maxDelayMs?: number;
}

export interface RetryHooks {
  /** 실패할 때마다 호출 (attempt는 1부터) */
  onFailure?: (error: unknown, attempt: number) => void;
  /** false를 반환하면 재시도하지 않고 마지막 오류를 그대로 throw */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * 최대 시도 횟수와 대기 시간만 알고, 무엇을 감싸는지는 모른다.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly delayMs: number;
  private readonly backoff: Backoff;
  private readonly maxDelayMs: number;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new ValidationError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.delayMs = Math.max(0, options.delayMs);
    this.backoff = options.backoff ?? 'fixed';
    this.maxDelayMs = options.maxDelayMs ?? Number.POSITIVE_INFINITY;
  }

  /** attempt번째 실패 후 대기 시간 */
  delayFor(attempt: number): number {
    const delay = this.backoff === 'exponential' ? this.delayMs * 2 ** (attempt - 1) : this.delayMs;
    return Math.min(delay, this.maxDelayMs);
  }

  async run<T>(operation: (attempt: number) => Promise<T>, hooks: RetryHooks = {}): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        lastError = error;
        hooks.onFailure?.(error, attempt);

        if (hooks.shouldRetry && !hooks.shouldRetry(error, attempt)) {
          throw error;
        }
        if (attempt < this.maxAttempts) {
          await sleep(this.delayFor(attempt));
        }
      }
    }

    throw new RetryExhaustedError(this.maxAttempts, lastError);
  }
}

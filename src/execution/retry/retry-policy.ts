import { setTimeout as delay } from 'node:timers/promises';
import { isTransientError, RateLimitedError } from '../../errors/trading-errors.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0.1 adds up to 10% on top of each delay */
  jitterFactor: number;
  isRetryable?: (error: unknown) => boolean;
  sleep?: SleepFn;
  random?: () => number;
}

export interface RetryExecutionOptions {
  /** Wait before the first attempt as well (reconnect schedules) */
  backoffBeforeFirstAttempt?: boolean;
  signal?: AbortSignal;
  onRetry?: (event: { attempt: number; delayMs: number; error: unknown }) => void;
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly lastError: unknown,
    public readonly attempts: number
  ) {
    super(
      `Operation failed after ${attempts} attempts: ${lastError instanceof Error ? lastError.message : String(lastError)}`,
      { cause: lastError }
    );
    this.name = 'RetryExhaustedError';
  }
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Exponential backoff with jitter. Only errors the classifier accepts are
 * retried; anything else is rethrown from the attempt that raised it.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitterFactor: number;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer. Got: ${options.maxAttempts}`);
    }
    if (options.baseDelayMs < 0 || options.maxDelayMs < options.baseDelayMs) {
      throw new Error('Delays must satisfy 0 <= baseDelayMs <= maxDelayMs');
    }

    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.jitterFactor = Math.max(0, options.jitterFactor);
    this.isRetryable = options.isRetryable ?? isTransientError;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /** Reconnect schedule: 5 attempts waiting 1s, 2s, 4s, 8s and 16s. */
  static reconnect(overrides: Partial<RetryPolicyOptions> = {}): RetryPolicy {
    return new RetryPolicy({
      maxAttempts: 5,
      baseDelayMs: 1000,
      maxDelayMs: 16_000,
      jitterFactor: 0,
      ...overrides,
    });
  }

  /** Dispatch schedule for transient order failures. */
  static dispatch(overrides: Partial<RetryPolicyOptions> = {}): RetryPolicy {
    return new RetryPolicy({
      maxAttempts: 3,
      baseDelayMs: 250,
      maxDelayMs: 2000,
      jitterFactor: 0.1,
      ...overrides,
    });
  }

  /**
   * Delay for the n-th wait (1-based): min(max, base * 2^(n-1)) plus jitter.
   */
  delayFor(n: number, error?: unknown): number {
    const exponential = Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(2, n - 1));
    const jittered = exponential * (1 + this.jitterFactor * this.random());

    if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
      return Math.max(jittered, error.retryAfterMs);
    }
    return jittered;
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryExecutionOptions = {}
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const waitIndex = options.backoffBeforeFirstAttempt ? attempt : attempt - 1;
      if (waitIndex > 0) {
        const delayMs = this.delayFor(waitIndex, lastError);
        options.onRetry?.({ attempt, delayMs, error: lastError });
        await this.sleep(delayMs, options.signal);
      }

      try {
        return await operation(attempt);
      } catch (error) {
        if (!this.isRetryable(error)) {
          throw error;
        }
        lastError = error;
      }
    }

    throw new RetryExhaustedError(lastError, this.maxAttempts);
  }
}

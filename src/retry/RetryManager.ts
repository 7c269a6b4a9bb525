import { EventEmitter } from 'events';
import { delay } from '../common/utils';

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  backoffFactor?: number;
  retryCondition?: (error: Error, attempt: number) => boolean;
  name?: string;
  /** Stops retrying once aborted; the last error is rethrown */
  signal?: AbortSignal;
}

export interface RetryScheduledEvent {
  name: string;
  /** Attempt that just failed, starting at 1 */
  attempt: number;
  delay: number;
  error: Error;
}

type ResolvedRetryOptions = Required<Omit<RetryOptions, 'signal'>> & { signal?: AbortSignal };

/**
 * Retry manager with exponential backoff. Wraps VM fleet calls so a
 * transient exec channel hiccup does not fail a whole run.
 *
 * Emits 'retry-scheduled' (RetryScheduledEvent) before each wait.
 */
export class RetryManager extends EventEmitter {
  private readonly options: ResolvedRetryOptions;

  constructor(options: RetryOptions = {}) {
    super();

    this.options = {
      maxRetries: options.maxRetries ?? 3,
      baseDelay: options.baseDelay ?? 1000,
      maxDelay: options.maxDelay ?? 30000,
      backoffFactor: options.backoffFactor ?? 2,
      retryCondition: options.retryCondition ?? (() => true),
      name: options.name ?? 'retry-manager',
      signal: options.signal
    };
  }

  /**
   * Execute operation with retry logic
   */
  async execute<T>(operation: () => Promise<T>, customOptions: Partial<RetryOptions> = {}): Promise<T> {
    const opts: ResolvedRetryOptions = {
      maxRetries: customOptions.maxRetries ?? this.options.maxRetries,
      baseDelay: customOptions.baseDelay ?? this.options.baseDelay,
      maxDelay: customOptions.maxDelay ?? this.options.maxDelay,
      backoffFactor: customOptions.backoffFactor ?? this.options.backoffFactor,
      retryCondition: customOptions.retryCondition ?? this.options.retryCondition,
      name: customOptions.name ?? this.options.name,
      signal: customOptions.signal ?? this.options.signal
    };
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= opts.maxRetries + 1; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        const willRetry = attempt <= opts.maxRetries &&
          opts.retryCondition(lastError, attempt) &&
          !opts.signal?.aborted;
        if (!willRetry) {
          break;
        }

        const nextDelay = this.calculateDelay(attempt, opts);
        const event: RetryScheduledEvent = { name: opts.name, attempt, delay: nextDelay, error: lastError };
        this.emit('retry-scheduled', event);
        await delay(nextDelay, opts.signal);
      }
    }

    throw lastError ?? new Error('Operation failed with unknown error');
  }

  private calculateDelay(attempt: number, options: ResolvedRetryOptions): number {
    const nextDelay = options.baseDelay * Math.pow(options.backoffFactor, attempt - 1);
    return Math.round(Math.min(nextDelay, options.maxDelay));
  }
}

export interface WithRetryOptions {
  attempts: number;
  settleDelayMs: number;
  signal?: AbortSignal;
  retryCondition?: (error: Error, attempt: number) => boolean;
  /** Called before each wait, e.g. to log the failed attempt */
  onRetry?: (event: RetryScheduledEvent) => void;
}

/**
 * Generic retry-with-backoff combinator parameterized by attempt count and
 * settle delay (the wait before the first retry; later waits double).
 */
export function withRetry<T>(operation: () => Promise<T>, options: WithRetryOptions): Promise<T> {
  const manager = new RetryManager({
    maxRetries: Math.max(0, options.attempts - 1),
    baseDelay: options.settleDelayMs,
    signal: options.signal,
    retryCondition: options.retryCondition
  });
  if (options.onRetry) {
    manager.on('retry-scheduled', options.onRetry);
  }
  return manager.execute(operation);
}

export type PollOutcome<T> =
  | { status: 'satisfied'; value: T; attempts: number; elapsedMs: number }
  | { status: 'timeout'; attempts: number; elapsedMs: number; lastError?: Error }
  | { status: 'aborted'; attempts: number; elapsedMs: number };

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
}

/**
 * Bounded, cancellable polling. The check returns undefined (or throws) while
 * the condition does not hold yet.
 */
export async function pollUntil<T>(check: () => Promise<T | undefined>, options: PollOptions): Promise<PollOutcome<T>> {
  const startTime = Date.now();
  let attempts = 0;
  let lastError: Error | undefined;

  for (;;) {
    if (options.signal?.aborted) {
      return { status: 'aborted', attempts, elapsedMs: Date.now() - startTime };
    }

    attempts++;
    try {
      const value = await check();
      if (value !== undefined) {
        return { status: 'satisfied', value, attempts, elapsedMs: Date.now() - startTime };
      }
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
    }

    const elapsedMs = Date.now() - startTime;
    if (elapsedMs >= options.timeoutMs) {
      return lastError
        ? { status: 'timeout', attempts, elapsedMs, lastError }
        : { status: 'timeout', attempts, elapsedMs };
    }

    await delay(Math.min(options.intervalMs, options.timeoutMs - elapsedMs), options.signal);
  }
}

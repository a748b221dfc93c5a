import PQueue from 'p-queue';
import { setTimeout as delay } from 'timers/promises';
import { DEFAULT_MAX_RETRIES, DEFAULT_PROVIDER_TIMEOUT_MS, DEFAULT_REQUESTS_PER_SECOND } from '../config/env';
import { TransientProviderError, isTransient } from '../errors';
import { logger, type Logger } from '../utils/logger';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RateLimiterConfig {
  concurrency?: number;
  /** `Infinity` lifts the cap. */
  requestsPerSecond?: number;
  maxRetries?: number;
  timeoutMs?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Shared gate for provider calls: caps request rate across all chapter
 * workers and retries transient failures in a bounded loop.
 */
export class RateLimiter {
  private queue: PQueue;
  private readonly maxRetries: number;
  private readonly timeoutMs: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(config: RateLimiterConfig = {}) {
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.baseDelayMs = config.baseDelayMs ?? 2000;
    this.maxDelayMs = config.maxDelayMs ?? 30000;
    this.sleep = config.sleep ?? defaultSleep;
    this.log = config.logger ?? logger.child('providers');

    this.queue = new PQueue({
      concurrency: config.concurrency ?? Infinity,
      intervalCap: config.requestsPerSecond ?? DEFAULT_REQUESTS_PER_SECOND,
      interval: 1000,
    });
  }

  /**
   * Runs `fn` at most `maxRetries + 1` times. Only TransientProviderError and
   * timeouts are retried; any other error is rethrown at once.
   */
  async execute<T>(label: string, fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      signal?.throwIfAborted();

      try {
        return await this.attempt(fn, signal);
      } catch (error) {
        if (signal?.aborted || !isTransient(error) || attempt >= this.maxRetries) {
          throw error;
        }

        const backoff = this.calculateBackoff(attempt, error);
        this.log.warn(`${label}: retry ${attempt + 1}/${this.maxRetries} after ${backoff}ms`, {
          reason: error.message,
        });
        await this.sleep(backoff, signal);
      }
    }
  }

  private attempt<T>(fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    // The clock starts once the queue hands out a slot
    return this.queue.add(() => this.withTimeout(fn, signal));
  }

  /**
   * Settles when `fn` does, or as soon as the caller cancels or the timeout
   * fires, even if `fn` never looks at its signal.
   */
  private async withTimeout<T>(fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();
    const timeout = new AbortController();
    const combined = signal ? AbortSignal.any([signal, timeout.signal]) : timeout.signal;
    const timer = setTimeout(() => {
      timeout.abort(new TransientProviderError(`Provider call timed out after ${this.timeoutMs}ms`));
    }, this.timeoutMs);

    let onAbort: () => void = () => undefined;
    const stopped = new Promise<never>((_, reject) => {
      onAbort = () => reject(combined.reason);
      combined.addEventListener('abort', onAbort, { once: true });
    });

    try {
      return await Promise.race([fn(combined), stopped]);
    } finally {
      clearTimeout(timer);
      combined.removeEventListener('abort', onAbort);
    }
  }

  calculateBackoff(attempt: number, error: TransientProviderError): number {
    if (error.retryAfterMs !== undefined) {
      return Math.min(error.retryAfterMs, this.maxDelayMs);
    }
    return Math.min(this.baseDelayMs * Math.pow(2, attempt), this.maxDelayMs);
  }

  get size(): number {
    return this.queue.size;
  }

  get pending(): number {
    return this.queue.pending;
  }
}

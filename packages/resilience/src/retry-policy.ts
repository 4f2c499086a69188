import { getLogger, type Logger } from '@relaypress/logger';

import { calculateBackoffDelay, calculateBackoffSchedule } from './core/backoff.js';
import { createRetryConfig, type RetryConfig } from './core/types.js';
import { resolveEffects, type ResilienceEffects } from './effects.js';
import { toError } from './errors.js';

export interface RetryEvent {
  /** Attempt that just failed (1 = initial call) */
  attempt: number;
  delayMs: number;
  error: unknown;
  maxRetries: number;
}

export interface RetryPolicyOptions extends Partial<RetryConfig> {
  /** Label used in log messages */
  operationName?: string | undefined;
  /** Return false to stop retrying and rethrow immediately. Default: retry every error. */
  shouldRetry?: ((error: unknown, attempt: number) => boolean) | undefined;
  onRetry?: ((event: RetryEvent) => void) | undefined;
}

/**
 * Retries a failing async operation with capped exponential backoff.
 * Holds configuration only; concurrent executions share nothing.
 */
export class RetryPolicy {
  readonly config: Readonly<RetryConfig>;
  private readonly effects: ResilienceEffects;
  private readonly logger: Logger;
  private readonly operationName: string;
  private readonly shouldRetry: (error: unknown, attempt: number) => boolean;
  private readonly onRetry: ((event: RetryEvent) => void) | undefined;

  constructor(options: RetryPolicyOptions = {}, effects?: Partial<ResilienceEffects>) {
    this.config = createRetryConfig(options);
    this.effects = resolveEffects(effects);
    this.operationName = options.operationName ?? 'operation';
    this.shouldRetry = options.shouldRetry ?? (() => true);
    this.onRetry = options.onRetry;
    this.logger = getLogger('RetryPolicy').withContext({ operation: this.operationName });
  }

  /**
   * Call `operation` until it succeeds or `maxRetries` retries have failed.
   * The error from the last attempt is rethrown unchanged.
   */
  async execute<T>(operation: (attempt: number) => Promise<T>): Promise<T> {
    const { maxRetries } = this.config;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (attempt > maxRetries) {
          if (maxRetries > 0) {
            this.logger.error(
              { error: toError(error), maxRetries },
              `Max retries (${maxRetries}) reached for ${this.operationName}`
            );
          }
          throw error;
        }

        if (!this.shouldRetry(error, attempt)) {
          this.logger.debug({ attempt }, `Not retrying ${this.operationName}: error is not retryable`);
          throw error;
        }

        const delayMs = calculateBackoffDelay(attempt, this.config);
        this.logger.warn(
          { attempt, delayMs, error: toError(error).message },
          `Retry ${attempt}/${maxRetries} after ${delayMs}ms for ${this.operationName}`
        );
        this.onRetry?.({ attempt, delayMs, error, maxRetries });

        await this.effects.delay(delayMs);
      }
    }
  }

  /**
   * Wrap `fn` so every call goes through execute(). The returned function has the same signature.
   */
  wrap<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => Promise<TResult>
  ): (...args: TArgs) => Promise<TResult> {
    return (...args: TArgs) => this.execute(() => fn(...args));
  }

  /**
   * Delay before each retry, in order
   */
  getDelays(): number[] {
    return calculateBackoffSchedule(this.config);
  }
}

import { getLogger, type Logger } from '@relaypress/logger';

import { assertTimerDelay } from './core/types.js';
import { TimeoutError } from './errors.js';

export interface TimeoutHandlerOptions {
  timeoutMs: number;
  operationName?: string | undefined;
}

/**
 * Bounds the wall-clock duration of a single async call.
 *
 * On expiry the caller gets a TimeoutError and the AbortSignal handed to the
 * operation is aborted. Work the operation already started is not undone.
 */
export class TimeoutHandler {
  readonly timeoutMs: number;
  private readonly operationName: string | undefined;
  private readonly logger: Logger;

  constructor(options: number | TimeoutHandlerOptions) {
    const resolved: TimeoutHandlerOptions = typeof options === 'number' ? { timeoutMs: options } : options;
    assertTimerDelay('timeoutMs', resolved.timeoutMs);

    this.timeoutMs = resolved.timeoutMs;
    this.operationName = resolved.operationName;
    this.logger = getLogger('TimeoutHandler').withContext({ timeoutMs: this.timeoutMs });
  }

  execute<T>(operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        const error = new TimeoutError(this.timeoutMs, this.operationName);
        this.logger.error(`Timeout after ${this.timeoutMs}ms for ${this.operationName ?? 'operation'}`);
        controller.abort(error);
        reject(error);
      }, this.timeoutMs);

      let pending: Promise<T>;
      try {
        pending = operation(controller.signal);
      } catch (error) {
        clearTimeout(timer);
        reject(error);
        return;
      }

      pending.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  /**
   * Wrap `fn` so every call is bounded by the deadline. The returned function has the same
   * signature; use execute() directly when the operation should observe the AbortSignal.
   */
  wrap<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => Promise<TResult>
  ): (...args: TArgs) => Promise<TResult> {
    return (...args: TArgs) => this.execute(() => fn(...args));
  }
}

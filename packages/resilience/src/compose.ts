import { ResultAsync } from 'neverthrow';

import { CircuitBreaker, type CircuitBreakerOptions } from './circuit-breaker.js';
import type { ResilienceEffects } from './effects.js';
import { toError } from './errors.js';
import { RetryPolicy, type RetryPolicyOptions } from './retry-policy.js';
import { TimeoutHandler, type TimeoutHandlerOptions } from './timeout-handler.js';

type AsyncFn<TArgs extends unknown[], TResult> = (...args: TArgs) => Promise<TResult>;

export interface ResilienceLayers {
  /** Outermost layer. A new breaker is only created when options are given instead of an instance. */
  circuitBreaker?: CircuitBreaker | (CircuitBreakerOptions & { name: string }) | undefined;
  retry?: RetryPolicy | RetryPolicyOptions | undefined;
  /** Innermost layer, applied to each attempt separately */
  timeout?: TimeoutHandler | TimeoutHandlerOptions | number | undefined;
  effects?: Partial<ResilienceEffects> | undefined;
}

function toTimeoutHandler(layer: TimeoutHandler | TimeoutHandlerOptions | number): TimeoutHandler {
  return layer instanceof TimeoutHandler ? layer : new TimeoutHandler(layer);
}

function toRetryPolicy(layer: RetryPolicy | RetryPolicyOptions, effects?: Partial<ResilienceEffects>): RetryPolicy {
  return layer instanceof RetryPolicy ? layer : new RetryPolicy(layer, effects);
}

function toCircuitBreaker(
  layer: CircuitBreaker | (CircuitBreakerOptions & { name: string }),
  effects?: Partial<ResilienceEffects>
): CircuitBreaker {
  if (layer instanceof CircuitBreaker) {
    return layer;
  }
  const { name, ...options } = layer;
  return new CircuitBreaker(name, options, effects);
}

/**
 * Stack the primitives around `fn`: timeout per attempt, retry around the
 * timed attempts, circuit breaker around the whole retry sequence.
 * A breaker therefore records one failure per exhausted retry sequence.
 */
export function composeResilience<TArgs extends unknown[], TResult>(
  fn: AsyncFn<TArgs, TResult>,
  layers: ResilienceLayers
): AsyncFn<TArgs, TResult> {
  let wrapped = fn;

  if (layers.timeout !== undefined) {
    wrapped = toTimeoutHandler(layers.timeout).wrap(wrapped);
  }
  if (layers.retry !== undefined) {
    wrapped = toRetryPolicy(layers.retry, layers.effects).wrap(wrapped);
  }
  if (layers.circuitBreaker !== undefined) {
    wrapped = toCircuitBreaker(layers.circuitBreaker, layers.effects).wrap(wrapped);
  }

  return wrapped;
}

/**
 * Adapt a throwing async function to return a Result instead
 */
export function toSafe<TArgs extends unknown[], TResult>(
  fn: AsyncFn<TArgs, TResult>
): (...args: TArgs) => ResultAsync<TResult, Error> {
  return (...args: TArgs) => ResultAsync.fromPromise(fn(...args), toError);
}

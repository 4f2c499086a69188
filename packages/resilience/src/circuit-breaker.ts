import { getLogger, type Logger } from '@relaypress/logger';

import * as CircuitCore from './core/circuit-breaker.js';
import type { CircuitState, CircuitStatistics, CircuitStatus, CircuitTransition } from './core/types.js';
import { createInitialCircuitState } from './core/types.js';
import { resolveEffects, type ResilienceEffects } from './effects.js';
import { CircuitOpenError, type ErrorPredicate } from './errors.js';

export interface CircuitStateChangeEvent {
  failureCount: number;
  from: CircuitStatus;
  name: string;
  to: CircuitStatus;
}

export interface CircuitBreakerOptions {
  failureThreshold?: number | undefined;
  recoveryTimeoutMs?: number | undefined;
  /**
   * Decides which errors count as failures. Errors it rejects are rethrown
   * without touching the failure count or the state. Default: every error counts.
   */
  isExpectedError?: ErrorPredicate | undefined;
  onStateChange?: ((event: CircuitStateChangeEvent) => void) | undefined;
}

/**
 * Stateful circuit breaker guarding one downstream resource.
 *
 * All decisions are delegated to the pure functions in core/circuit-breaker;
 * this class only owns the current state and the clock.
 */
export class CircuitBreaker {
  private state: CircuitState;
  private readonly effects: ResilienceEffects;
  private readonly logger: Logger;
  private readonly isExpectedError: ErrorPredicate;
  private readonly onStateChange: ((event: CircuitStateChangeEvent) => void) | undefined;

  constructor(
    public readonly name: string,
    options: CircuitBreakerOptions = {},
    effects?: Partial<ResilienceEffects>
  ) {
    this.state = createInitialCircuitState(options.failureThreshold, options.recoveryTimeoutMs);
    this.effects = resolveEffects(effects);
    this.isExpectedError = options.isExpectedError ?? (() => true);
    this.onStateChange = options.onStateChange;
    this.logger = getLogger(`CircuitBreaker:${name}`);
  }

  /**
   * Run `operation` under the breaker. Rejects with CircuitOpenError, without calling
   * `operation`, while the circuit is open or a half-open probe is already running.
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const previous = this.state;
    const decision = CircuitCore.admitCall(previous, this.effects.now());
    this.state = decision.state;

    if (!decision.admitted) {
      this.logger.debug({ retryAfterMs: decision.retryAfterMs }, `Rejected call: circuit ${this.name} is open`);
      throw new CircuitOpenError(this.name, decision.retryAfterMs);
    }

    if (decision.transition) {
      this.logger.debug('Recovery timeout elapsed, allowing a half-open probe');
      this.emitTransition(decision.transition);
    } else if (decision.probe && previous.probeInFlight) {
      this.logger.warn(
        { recoveryTimeoutMs: previous.recoveryTimeoutMs },
        'Half-open probe did not settle within the recovery timeout, admitting a new probe'
      );
    }

    const probeStartedTime = decision.probe ? decision.state.probeStartedTime : undefined;
    let result: T;
    try {
      result = await operation();
    } catch (error) {
      this.handleFailure(error, probeStartedTime);
      throw error;
    }

    this.handleSuccess();
    return result;
  }

  /**
   * Wrap `fn` so every call goes through execute(). The returned function has the same signature.
   */
  wrap<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => Promise<TResult>
  ): (...args: TArgs) => Promise<TResult> {
    return (...args: TArgs) => this.execute(() => fn(...args));
  }

  getState(): CircuitStatus {
    return CircuitCore.getCircuitStatus(this.state, this.effects.now());
  }

  getFailureCount(): number {
    return this.state.failureCount;
  }

  isOpen(): boolean {
    return this.getState() === 'open';
  }

  getStatistics(): CircuitStatistics {
    return CircuitCore.getCircuitStatistics(this.name, this.state, this.effects.now());
  }

  /**
   * Force the circuit closed and forget the failure history
   */
  reset(): void {
    const from = this.state.status;
    this.state = CircuitCore.resetCircuit(this.state);
    if (from !== 'closed') {
      this.logger.info('Circuit breaker manually reset');
      this.emitTransition({ from, to: 'closed' });
    }
  }

  private handleSuccess(): void {
    const from = this.state.status;
    this.state = CircuitCore.recordSuccess(this.state, this.effects.now());

    if (from !== 'closed') {
      this.logger.info('Circuit breaker recovered, closing circuit');
      this.emitTransition({ from, to: 'closed' });
    }
  }

  private handleFailure(error: unknown, probeStartedTime: number | undefined): void {
    if (!this.isExpectedError(error)) {
      if (probeStartedTime !== undefined) {
        this.state = CircuitCore.releaseProbe(this.state, probeStartedTime);
      }
      return;
    }

    const from = this.state.status;
    this.state = CircuitCore.recordFailure(this.state, this.effects.now());
    const to = this.state.status;

    if (from === to) {
      return;
    }
    if (from === 'half-open') {
      this.logger.warn(
        { failureCount: this.state.failureCount },
        'Circuit breaker reopened after failure in half-open state'
      );
    } else {
      this.logger.warn(
        { failureCount: this.state.failureCount },
        `Circuit breaker opened after ${this.state.failureCount} failures`
      );
    }
    this.emitTransition({ from, to });
  }

  private emitTransition(transition: CircuitTransition): void {
    this.onStateChange?.({
      failureCount: this.state.failureCount,
      from: transition.from,
      name: this.name,
      to: transition.to,
    });
  }
}

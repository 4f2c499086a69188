import { CircuitBreaker, type CircuitBreakerOptions, type CircuitStateChangeEvent } from './circuit-breaker.js';
import type { CircuitStatistics } from './core/types.js';
import type { ResilienceEffects } from './effects.js';

export interface CircuitBreakerRegistryOptions {
  /** Options applied to every breaker the registry creates, overridable per breaker */
  defaults?: Omit<CircuitBreakerOptions, 'onStateChange'> | undefined;
  effects?: Partial<ResilienceEffects> | undefined;
  /** Called for transitions of any breaker in the registry */
  onStateChange?: ((event: CircuitStateChangeEvent) => void) | undefined;
}

/**
 * Named circuit breakers, one per guarded resource (e.g. 'crm', 'platform').
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(private readonly options: CircuitBreakerRegistryOptions = {}) {}

  /**
   * Return the breaker registered under `name`, creating it on first use.
   * `options` only apply when the breaker is created.
   */
  getOrCreate(name: string, options: CircuitBreakerOptions = {}): CircuitBreaker {
    const existing = this.breakers.get(name);
    if (existing) {
      return existing;
    }

    const registryHook = this.options.onStateChange;
    const breakerHook = options.onStateChange;
    const breaker = new CircuitBreaker(
      name,
      {
        ...this.options.defaults,
        ...options,
        onStateChange: (event) => {
          breakerHook?.(event);
          registryHook?.(event);
        },
      },
      this.options.effects
    );
    this.breakers.set(name, breaker);
    return breaker;
  }

  get(name: string): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }

  has(name: string): boolean {
    return this.breakers.has(name);
  }

  /**
   * Returns false when no breaker is registered under `name`
   */
  reset(name: string): boolean {
    const breaker = this.breakers.get(name);
    if (!breaker) {
      return false;
    }
    breaker.reset();
    return true;
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }

  /**
   * Snapshot of every breaker, for health reporting
   */
  getStatistics(): CircuitStatistics[] {
    return [...this.breakers.values()].map((breaker) => breaker.getStatistics());
  }

  clear(): void {
    this.breakers.clear();
  }
}

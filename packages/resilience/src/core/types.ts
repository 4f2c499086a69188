// Pure data for the functional core. No classes, only structures and factories.

import { ResilienceConfigError } from '../errors.js';

export type CircuitStatus = 'closed' | 'open' | 'half-open';

/**
 * Circuit breaker state (immutable)
 */
export interface CircuitState {
  failureCount: number;
  failureThreshold: number;
  lastFailureTime: number | undefined;
  lastSuccessTime: number | undefined;
  /** Set while the single half-open trial call is running */
  probeInFlight: boolean;
  /** When the running probe was admitted; a probe older than the cooldown no longer holds the slot */
  probeStartedTime: number | undefined;
  recoveryTimeoutMs: number;
  status: CircuitStatus;
}

export interface CircuitTransition {
  from: CircuitStatus;
  to: CircuitStatus;
}

export type AdmissionDecision =
  | { admitted: true; probe: boolean; state: CircuitState; transition?: CircuitTransition | undefined }
  | { admitted: false; retryAfterMs: number; state: CircuitState };

export interface CircuitStatistics {
  failureCount: number;
  failureThreshold: number;
  lastFailureTime: number | undefined;
  lastSuccessTime: number | undefined;
  name: string;
  recoveryTimeoutMs: number;
  state: CircuitStatus;
  timeUntilRecoveryMs: number;
}

export interface BackoffConfig {
  baseDelayMs: number;
  exponentialBase: number;
  maxDelayMs: number;
}

export interface RetryConfig extends BackoffConfig {
  maxRetries: number;
}

export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_RECOVERY_TIMEOUT_MS = 60_000;

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  baseDelayMs: 1000,
  exponentialBase: 2,
  maxDelayMs: 60_000,
  maxRetries: 3,
};

/** Largest delay setTimeout honours; Node fires anything longer after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const assertFinite = (field: string, value: number): void => {
  if (!Number.isFinite(value)) {
    throw new ResilienceConfigError(field, `must be a finite number, got ${value}`);
  }
};

export const assertNonNegativeFinite = (field: string, value: number): void => {
  if (!Number.isFinite(value) || value < 0) {
    throw new ResilienceConfigError(field, `must be a non-negative finite number, got ${value}`);
  }
};

export const assertTimerDelay = (field: string, value: number): void => {
  assertNonNegativeFinite(field, value);
  if (value > MAX_TIMER_DELAY_MS) {
    throw new ResilienceConfigError(field, `must not exceed ${MAX_TIMER_DELAY_MS}ms, got ${value}`);
  }
};

/**
 * Factory functions for initial states
 */
export const createInitialCircuitState = (
  failureThreshold = DEFAULT_FAILURE_THRESHOLD,
  recoveryTimeoutMs = DEFAULT_RECOVERY_TIMEOUT_MS
): CircuitState => {
  // A threshold of zero or below is legal: the circuit opens on the first counted failure
  assertFinite('failureThreshold', failureThreshold);
  assertNonNegativeFinite('recoveryTimeoutMs', recoveryTimeoutMs);

  return {
    failureCount: 0,
    failureThreshold,
    lastFailureTime: undefined,
    lastSuccessTime: undefined,
    probeInFlight: false,
    probeStartedTime: undefined,
    recoveryTimeoutMs,
    status: 'closed',
  };
};

export const createRetryConfig = (overrides: Partial<RetryConfig> = {}): RetryConfig => {
  const config: RetryConfig = {
    baseDelayMs: overrides.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    exponentialBase: overrides.exponentialBase ?? DEFAULT_RETRY_CONFIG.exponentialBase,
    maxDelayMs: overrides.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    maxRetries: overrides.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
  };

  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
    throw new ResilienceConfigError('maxRetries', `must be a non-negative integer, got ${config.maxRetries}`);
  }
  assertTimerDelay('baseDelayMs', config.baseDelayMs);
  assertTimerDelay('maxDelayMs', config.maxDelayMs);
  if (!Number.isFinite(config.exponentialBase) || config.exponentialBase < 1) {
    throw new ResilienceConfigError('exponentialBase', `must be a finite number >= 1, got ${config.exponentialBase}`);
  }

  return config;
};

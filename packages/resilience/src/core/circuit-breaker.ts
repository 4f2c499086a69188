// Pure circuit breaker functions
// Every function takes a state and returns a new one; the clock is passed in

import type { AdmissionDecision, CircuitState, CircuitStatistics, CircuitStatus } from './types.js';

/**
 * Whether the cooldown since the last counted failure has elapsed
 */
export const isRecoveryDue = (state: CircuitState, currentTime: number): boolean => {
  if (state.lastFailureTime === undefined) {
    return true;
  }
  return currentTime - state.lastFailureTime >= state.recoveryTimeoutMs;
};

/**
 * Status as an observer sees it: an open circuit whose cooldown elapsed reads as half-open,
 * even before the next call performs the transition.
 */
export const getCircuitStatus = (state: CircuitState, currentTime: number): CircuitStatus => {
  if (state.status === 'open' && isRecoveryDue(state, currentTime)) {
    return 'half-open';
  }
  return state.status;
};

export const getTimeUntilRecovery = (state: CircuitState, currentTime: number): number => {
  if (state.status !== 'open' || state.lastFailureTime === undefined) {
    return 0;
  }
  return Math.max(0, state.recoveryTimeoutMs - (currentTime - state.lastFailureTime));
};

/**
 * How much longer the running half-open probe keeps the slot. A probe that has not
 * settled within one cooldown is abandoned, so a hung call cannot lock the circuit.
 */
export const getProbeHoldRemaining = (state: CircuitState, currentTime: number): number => {
  if (!state.probeInFlight || state.probeStartedTime === undefined) {
    return 0;
  }
  return Math.max(0, state.recoveryTimeoutMs - (currentTime - state.probeStartedTime));
};

const startProbe = (state: CircuitState, currentTime: number): CircuitState => ({
  ...state,
  probeInFlight: true,
  probeStartedTime: currentTime,
});

/**
 * Decide whether a call may proceed.
 *
 * closed admits everything. open rejects until the cooldown elapses, then moves to
 * half-open and admits the caller as the probe. half-open admits one probe at a time;
 * a probe still running after a full cooldown gives its slot to the next caller.
 */
export const admitCall = (state: CircuitState, currentTime: number): AdmissionDecision => {
  switch (state.status) {
    case 'closed':
      return { admitted: true, probe: false, state };
    case 'half-open': {
      const probeHeldMs = getProbeHoldRemaining(state, currentTime);
      if (probeHeldMs > 0) {
        return { admitted: false, retryAfterMs: probeHeldMs, state };
      }
      return { admitted: true, probe: true, state: startProbe(state, currentTime) };
    }
    case 'open':
      if (!isRecoveryDue(state, currentTime)) {
        return { admitted: false, retryAfterMs: getTimeUntilRecovery(state, currentTime), state };
      }
      return {
        admitted: true,
        probe: true,
        state: { ...startProbe(state, currentTime), status: 'half-open' },
        transition: { from: 'open', to: 'half-open' },
      };
  }
};

/**
 * Record a counted failure.
 * Reaching the threshold opens the circuit; any failure outside closed keeps or puts it open.
 */
export const recordFailure = (state: CircuitState, currentTime: number): CircuitState => {
  const failureCount = state.failureCount + 1;
  const status: CircuitStatus =
    failureCount >= state.failureThreshold || state.status !== 'closed' ? 'open' : 'closed';

  return {
    ...state,
    failureCount,
    lastFailureTime: currentTime,
    probeInFlight: false,
    probeStartedTime: undefined,
    status,
  };
};

/**
 * Record a success: closes the circuit and clears the failure streak
 */
export const recordSuccess = (state: CircuitState, currentTime: number): CircuitState => {
  return {
    ...state,
    failureCount: 0,
    lastSuccessTime: currentTime,
    probeInFlight: false,
    probeStartedTime: undefined,
    status: 'closed',
  };
};

/**
 * Free the half-open probe slot without counting anything (probe failed with an ignored error).
 * With `probeStartedTime`, only that probe's slot is freed; an abandoned probe settling late
 * leaves its successor alone.
 */
export const releaseProbe = (state: CircuitState, probeStartedTime?: number): CircuitState => {
  if (!state.probeInFlight) {
    return state;
  }
  if (probeStartedTime !== undefined && state.probeStartedTime !== probeStartedTime) {
    return state;
  }
  return { ...state, probeInFlight: false, probeStartedTime: undefined };
};

/**
 * Reset circuit breaker to initial state
 */
export const resetCircuit = (state: CircuitState): CircuitState => {
  return {
    ...state,
    failureCount: 0,
    lastFailureTime: undefined,
    lastSuccessTime: undefined,
    probeInFlight: false,
    probeStartedTime: undefined,
    status: 'closed',
  };
};

export const getCircuitStatistics = (name: string, state: CircuitState, currentTime: number): CircuitStatistics => {
  return {
    failureCount: state.failureCount,
    failureThreshold: state.failureThreshold,
    lastFailureTime: state.lastFailureTime,
    lastSuccessTime: state.lastSuccessTime,
    name,
    recoveryTimeoutMs: state.recoveryTimeoutMs,
    state: getCircuitStatus(state, currentTime),
    timeUntilRecoveryMs: getTimeUntilRecovery(state, currentTime),
  };
};

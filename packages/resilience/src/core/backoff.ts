import type { BackoffConfig, RetryConfig } from './types.js';

/**
 * Delay before retry number `retryNumber` (1 = first retry):
 * min(baseDelayMs * exponentialBase^(retryNumber - 1), maxDelayMs)
 */
export const calculateBackoffDelay = (retryNumber: number, config: BackoffConfig): number => {
  if (config.baseDelayMs === 0) {
    return 0;
  }
  const delay = config.baseDelayMs * Math.pow(config.exponentialBase, retryNumber - 1);
  return Math.min(delay, config.maxDelayMs);
};

/**
 * Every delay the policy would wait through if all attempts fail
 */
export const calculateBackoffSchedule = (config: RetryConfig): number[] => {
  return Array.from({ length: config.maxRetries }, (_, index) => calculateBackoffDelay(index + 1, config));
};

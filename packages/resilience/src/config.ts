import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { MAX_TIMER_DELAY_MS, type RetryConfig } from './core/types.js';

const MAX_TIMER_DELAY_SECONDS = MAX_TIMER_DELAY_MS / 1000;

// An exported-but-empty variable (FOO=) means "unset", not 0
const emptyAsUnset = (value: unknown): unknown => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const timerSeconds = () =>
  z.coerce
    .number()
    .nonnegative()
    .max(MAX_TIMER_DELAY_SECONDS, { message: `must not exceed ${MAX_TIMER_DELAY_SECONDS} seconds` });

/**
 * Environment variables, in seconds where they are durations
 */
export const resilienceEnvSchema = z.object({
  CIRCUIT_BREAKER_FAILURE_THRESHOLD: z.preprocess(emptyAsUnset, z.coerce.number().int().default(5)),
  CIRCUIT_BREAKER_RECOVERY_TIMEOUT: z.preprocess(emptyAsUnset, z.coerce.number().nonnegative().default(60)),
  MAX_RETRIES: z.preprocess(emptyAsUnset, z.coerce.number().int().nonnegative().default(3)),
  OPERATION_TIMEOUT: z.preprocess(emptyAsUnset, timerSeconds().default(30)),
  RETRY_BACKOFF_BASE: z.preprocess(emptyAsUnset, z.coerce.number().min(1).default(2)),
  RETRY_BASE_DELAY: z.preprocess(emptyAsUnset, timerSeconds().default(1)),
  RETRY_MAX_WAIT: z.preprocess(emptyAsUnset, timerSeconds().default(60)),
});

export type ResilienceEnv = z.infer<typeof resilienceEnvSchema>;

export interface ResilienceConfig {
  circuitBreaker: { failureThreshold: number; recoveryTimeoutMs: number };
  retry: RetryConfig;
  timeout: { timeoutMs: number };
}

export type ConfigIssueSeverity = 'medium' | 'high';

export interface ConfigIssue {
  key: string;
  message: string;
  severity: ConfigIssueSeverity;
  suggestion: string;
}

const secondsToMs = (seconds: number): number => Math.round(seconds * 1000);

/**
 * Read resilience settings from the environment and convert them to the
 * millisecond option objects the primitives take.
 */
export function loadResilienceConfig(env: NodeJS.ProcessEnv = process.env): Result<ResilienceConfig, Error> {
  const parsed = resilienceEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    return err(new Error(`Resilience environment validation failed:\n${issues}`));
  }

  const values = parsed.data;
  return ok({
    circuitBreaker: {
      failureThreshold: values.CIRCUIT_BREAKER_FAILURE_THRESHOLD,
      recoveryTimeoutMs: secondsToMs(values.CIRCUIT_BREAKER_RECOVERY_TIMEOUT),
    },
    retry: {
      baseDelayMs: secondsToMs(values.RETRY_BASE_DELAY),
      exponentialBase: values.RETRY_BACKOFF_BASE,
      maxDelayMs: secondsToMs(values.RETRY_MAX_WAIT),
      maxRetries: values.MAX_RETRIES,
    },
    timeout: {
      timeoutMs: secondsToMs(values.OPERATION_TIMEOUT),
    },
  });
}

/**
 * Advisory checks for settings that are valid but likely to hurt in production
 */
export function auditResilienceConfig(config: ResilienceConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const timeoutSeconds = config.timeout.timeoutMs / 1000;

  if (timeoutSeconds < 5) {
    issues.push({
      key: 'OPERATION_TIMEOUT',
      message: `Timeout is very short (${timeoutSeconds}s)`,
      severity: 'medium',
      suggestion: 'Consider increasing OPERATION_TIMEOUT for production stability',
    });
  } else if (timeoutSeconds > 300) {
    issues.push({
      key: 'OPERATION_TIMEOUT',
      message: `Timeout is very long (${timeoutSeconds}s)`,
      severity: 'medium',
      suggestion: 'Consider reducing OPERATION_TIMEOUT to avoid blocking operations',
    });
  }

  const retries = config.retry.maxRetries;
  if (retries < 1) {
    issues.push({
      key: 'MAX_RETRIES',
      message: `Retry count is too low (${retries})`,
      severity: 'medium',
      suggestion: 'Set MAX_RETRIES to at least 1 for resilience',
    });
  } else if (retries > 10) {
    issues.push({
      key: 'MAX_RETRIES',
      message: `Retry count is very high (${retries})`,
      severity: 'medium',
      suggestion: 'Consider reducing MAX_RETRIES to avoid excessive delays',
    });
  }

  if (config.circuitBreaker.failureThreshold <= 0) {
    issues.push({
      key: 'CIRCUIT_BREAKER_FAILURE_THRESHOLD',
      message: `Failure threshold is ${config.circuitBreaker.failureThreshold}; the circuit opens on the first failure`,
      severity: 'high',
      suggestion: 'Set CIRCUIT_BREAKER_FAILURE_THRESHOLD to a positive integer',
    });
  }

  return issues;
}

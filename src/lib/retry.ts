/**
 * Retry loop with exponential backoff
 */
import { setTimeout as delay } from 'node:timers/promises';

import type winston from 'winston';

import type { RetryPolicy } from './types';
import { errorMessage, isRetryable } from './errors';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async ms => {
  await delay(ms);
};

export interface RetryOptions {
  /** Called between attempts, before sleeping. A failure aborts the loop. */
  reconnect?: () => Promise<void>;
  isRetryable?: (err: unknown) => boolean;
  sleep?: Sleep;
  logger?: winston.Logger;
  label?: string;
}

/**
 * Delay to wait after the given (1-based) failed attempt
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.initialDelayMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(raw, policy.maxDelayMs);
}

export function maxAttempts(policy: RetryPolicy): number {
  return policy.enabled ? Math.max(1, Math.floor(policy.maxAttempts)) : 1;
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = maxAttempts(policy);
  const retryable = options.isRetryable ?? isRetryable;
  const sleep = options.sleep ?? defaultSleep;
  const label = options.label ?? 'operation';

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (attempt >= attempts || !retryable(err)) throw err;
      const wait = backoffDelay(policy, attempt);
      options.logger?.warn(
        `${label} failed (attempt ${attempt}/${attempts}): ${errorMessage(err)}, retrying in ${wait}ms`
      );
      if (options.reconnect) {
        try {
          await options.reconnect();
        } catch (reconnectError) {
          options.logger?.error(
            `${label}: reconnection failed: ${errorMessage(reconnectError)}`
          );
          throw err;
        }
      }
      await sleep(wait);
    }
  }
}

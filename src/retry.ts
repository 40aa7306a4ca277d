import type pino from "pino";
import { RetryExhaustedError } from "./errors.js";
import { wait } from "./http.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  /** Upper bound of random jitter added to each delay before capping at `maxDelayMs`. */
  jitterMs?: number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryDependencies {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  signal?: AbortSignal;
}

/**
 * Delay to wait before `attempt` (2 for the first retry):
 * `min(max, max(min, base * 2^(attempt - 1)))`, plus jitter, capped at max.
 */
export function computeBackoffMs(
  attempt: number,
  policy: Pick<RetryPolicy, "baseDelayMs" | "minDelayMs" | "maxDelayMs" | "jitterMs">,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const bounded = Math.min(policy.maxDelayMs, Math.max(policy.minDelayMs, exponential));
  const jitter = policy.jitterMs ? Math.floor(random() * (policy.jitterMs + 1)) : 0;
  return Math.min(policy.maxDelayMs, bounded + jitter);
}

export async function withRetry<T>(
  logger: pino.Logger,
  operationName: string,
  fn: () => Promise<T>,
  policy: RetryPolicy,
  dependencies: RetryDependencies = {},
): Promise<T> {
  const sleep = dependencies.sleep ?? wait;
  const random = dependencies.random ?? Math.random;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await fn();
    } catch (error) {
      if (!policy.isRetryable(error) || dependencies.signal?.aborted) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(operationName, attempt, error);
      }

      const delayMs = computeBackoffMs(attempt + 1, policy, random);
      logger.warn(
        {
          operationName,
          attempt,
          maxAttempts,
          delayMs,
          err: error,
        },
        "Transient transport error, retrying",
      );
      await sleep(delayMs, dependencies.signal);
      if (dependencies.signal?.aborted) {
        throw error;
      }
    }
  }
}

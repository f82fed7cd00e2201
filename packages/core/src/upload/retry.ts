import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import { PipelineError, TransferError } from "../errors/catalog.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  maxJitterMs: number;
}

/** Resolves after `ms`, or rejects with the signal's reason once aborted. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = (ms, signal) => delay(ms, undefined, { signal });

/**
 * Exponential backoff with jitter before retry number `retry` (0-based):
 * `min(base·2^retry, max) + random·jitter`. A store's Retry-After hint
 * raises the delay, never lowers it.
 */
export function backoffDelay(
  policy: RetryPolicy,
  retry: number,
  random: () => number = Math.random,
  retryAfterMs?: number,
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, retry);
  const capped = Math.min(exponential, policy.maxDelayMs);
  const jitter = random() * policy.maxJitterMs;
  return Math.max(capped + jitter, retryAfterMs ?? 0);
}

/**
 * Pipeline errors say for themselves whether they are transient. Anything
 * else (a failed fs call, a dropped connection) is treated as transient.
 */
export function isRetryable(err: unknown): boolean {
  if (err instanceof PipelineError) return err.transient;
  return true;
}

export function retryAfterHint(err: unknown): number | undefined {
  return err instanceof TransferError ? err.retryAfterMs : undefined;
}

export interface RetryOptions {
  policy: RetryPolicy;
  logger: Logger;
  sleep?: Sleeper;
  random?: () => number;
  signal?: AbortSignal;
}

/**
 * Run `task` until it succeeds, fails permanently or uses up
 * `policy.maxAttempts`; the last error is rethrown. An aborted backoff
 * sleep rejects with the signal's reason.
 */
export async function retryWithBackoff<T>(
  operation: string,
  task: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, logger } = options;
  const pause = options.sleep ?? sleep;
  const random = options.random ?? Math.random;

  for (let attempt = 1; ; attempt++) {
    try {
      return await task();
    } catch (err) {
      if (!isRetryable(err) || attempt >= policy.maxAttempts) throw err;
      const delayMs = backoffDelay(policy, attempt - 1, random, retryAfterHint(err));
      logger.warn({ err, attempt, delayMs }, `${operation} failed, retrying`);
      await pause(delayMs, options.signal);
    }
  }
}

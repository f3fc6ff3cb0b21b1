import { Err, type Result } from "@codebrief/core";

import type { AnnotationError } from "../model.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Delay before attempt `attempt + 1`: base * 2^(attempt - 1), capped */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

export interface RetryOutcome<T> {
  result: Result<T, AnnotationError>;
  attempts: number;
}

/**
 * Run `call` until it succeeds, fails terminally, or runs out of attempts.
 * Only transient errors are retried; running out turns the last transient
 * error into a terminal one.
 */
export async function withRetry<T>(
  call: () => Promise<Result<T, AnnotationError>>,
  policy: RetryPolicy,
  options: {
    sleep?: Sleep;
    onRetry?: (error: AnnotationError, attempt: number, delayMs: number) => void;
  } = {}
): Promise<RetryOutcome<T>> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    const result = await call();
    if (result.ok || result.error.kind === "terminal") {
      return { result, attempts: attempt };
    }

    if (attempt >= policy.maxAttempts) {
      const exhausted: AnnotationError = {
        ...result.error,
        kind: "terminal",
        message: `Gave up after ${attempt} attempts: ${result.error.message}`,
      };
      return { result: Err(exhausted), attempts: attempt };
    }

    const delay = backoffDelay(policy, attempt);
    options.onRetry?.(result.error, attempt, delay);
    await wait(delay);
  }
}

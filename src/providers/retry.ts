import pino from "pino";
import { RateLimitError } from "../core/errors.js";

const logger = pino({ name: "rate-limit-retry" });

export interface RetryPolicy {
  /** Extra attempts after the first one (default 1) */
  retries: number;
  /** Fixed wait before each retry */
  backoffMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { retries: 1, backoffMs: 2000 };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn`, retrying only on RateLimitError, at most `policy.retries` times.
 * `onAttempt` sees the 1-based number of every attempt that starts.
 */
export async function withRateLimitRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  onAttempt?: (attempt: number) => void,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    onAttempt?.(attempt);
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof RateLimitError) || attempt > policy.retries) {
        throw error;
      }
      logger.warn({ attempt, backoffMs: policy.backoffMs }, "Rate limited, retrying after backoff");
      await sleep(policy.backoffMs);
    }
  }
}

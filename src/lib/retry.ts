import { sleep, type Delay } from "./abort";
import { debug, warn } from "./logger";

const DEFAULT_RETRY_DELAY_MS = 2000;
const DEFAULT_MAX_RETRIES = 3;

export type RetryOptions = {
  maxRetries?: number | undefined;
  defaultDelayMs?: number | undefined;
  label?: string | undefined;
  delay?: Delay | undefined;
  signal?: AbortSignal | undefined;
};

export type RetryResult = {
  response: Response;
  retries: number;
  exhausted: boolean;
};

/**
 * Integer seconds from a Retry-After header, or null when absent/unusable.
 */
export function parseRetryAfterMs(headerValue: string | null): number | null {
  if (!headerValue) return null;
  const trimmed = headerValue.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10) * 1000;
}

/**
 * Re-issues `fn` while it answers HTTP 429, waiting Retry-After seconds
 * (or the default delay) between attempts.
 * Every other status is handed back on the first attempt.
 */
export async function withRateLimitRetry(
  fn: () => Promise<Response>,
  options?: RetryOptions
): Promise<RetryResult> {
  const maxRetries = options?.maxRetries ?? DEFAULT_MAX_RETRIES;
  const defaultDelayMs = options?.defaultDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const label = options?.label ?? "request";
  const delay = options?.delay ?? sleep;

  for (let attempt = 0; ; attempt++) {
    const response = await fn();

    if (response.status !== 429) {
      return { response, retries: attempt, exhausted: false };
    }

    if (attempt === maxRetries) {
      warn(`[retry] ${label}: 429 after ${maxRetries} retries, giving up`);
      return { response, retries: attempt, exhausted: true };
    }

    const delayMs =
      parseRetryAfterMs(response.headers.get("retry-after")) ?? defaultDelayMs;

    // release the connection before waiting
    await response.body?.cancel();
    debug(
      `[retry] ${label}: 429, waiting ${delayMs / 1000}s (attempt ${attempt + 1}/${maxRetries})`
    );
    await delay(delayMs, options?.signal);
  }
}

import { ServerUnreachable } from "../errors.js";
import { logger } from "../logger.js";

export interface BackoffOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  /** A check still pending after this long counts as a failed attempt. */
  attemptTimeoutMs?: number;
}

export const DEFAULT_BACKOFF: Required<BackoffOptions> = {
  maxAttempts: 12,
  initialDelayMs: 500,
  maxDelayMs: 16_000,
  attemptTimeoutMs: 5_000,
};

/** Delay before attempt `attempt + 1`, doubling from the initial delay. */
export function backoffDelay(attempt: number, options: Required<BackoffOptions>): number {
  return Math.min(options.initialDelayMs * 2 ** (attempt - 1), options.maxDelayMs);
}

/**
 * Poll `check` until it resolves to true. Each call gets a signal that aborts
 * after `attemptTimeoutMs`; the attempt fails then even if the check ignores it.
 * Throws ServerUnreachable once the attempt budget is exhausted.
 */
export async function waitUntilReachable(
  url: string,
  check: (signal: AbortSignal) => Promise<boolean>,
  options: BackoffOptions = {},
): Promise<number> {
  const opts = { ...DEFAULT_BACKOFF, ...options };
  let lastError: unknown;
  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      if (await checkOnce(check, opts.attemptTimeoutMs)) {
        logger.info(`[up] Homeserver answered after ${attempt} attempt(s)`);
        return attempt;
      }
      lastError = undefined;
    } catch (err) {
      lastError = err;
    }
    if (attempt < opts.maxAttempts) {
      const delay = backoffDelay(attempt, opts);
      logger.debug(`[up] Homeserver not ready (attempt ${attempt}/${opts.maxAttempts}), retrying in ${delay}ms`);
      await sleep(delay);
    }
  }
  throw new ServerUnreachable(url, opts.maxAttempts, lastError);
}

function checkOnce(check: (signal: AbortSignal) => Promise<boolean>, timeoutMs: number): Promise<boolean> {
  const signal = AbortSignal.timeout(timeoutMs);
  const aborted = new Promise<never>((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
  return Promise.race([check(signal), aborted]);
}

/** True for the rejection of a fetch cut short by `AbortSignal.timeout`. */
export function isTimeout(err: unknown): boolean {
  return typeof err === "object" && err !== null && "name" in err && err.name === "TimeoutError";
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

import { setTimeout as sleep } from "node:timers/promises";
import { GrammyError } from "grammy";
import { describeError, logger } from "@/observability/logger";

const NETWORK_FAILURE =
  /network request|fetch failed|timeout|econn|etimedout|eai_again|socket hang up|und_err/i;

/** 5xx, 429 and connection-level failures; everything else is final. */
export const isTransientTelegramError = (error: unknown) => {
  if (error instanceof GrammyError && (error.error_code >= 500 || error.error_code === 429)) {
    return true;
  }
  return NETWORK_FAILURE.test(describeError(error));
};

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  wait?: (ms: number) => Promise<unknown>;
};

export const TELEGRAM_BOOTSTRAP_RETRY: RetryPolicy = {
  maxAttempts: 8,
  baseDelayMs: 750,
};

/**
 * Runs a Telegram call made during startup, retrying transient failures with a
 * linearly growing delay.
 */
export const withTelegramRetry = async <T>(
  label: string,
  run: () => Promise<T>,
  policy: RetryPolicy = TELEGRAM_BOOTSTRAP_RETRY,
): Promise<T> => {
  const wait = policy.wait ?? sleep;
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await run();
    } catch (error) {
      if (attempt >= policy.maxAttempts || !isTransientTelegramError(error)) {
        throw error;
      }
      const delayMs = policy.baseDelayMs * attempt;
      logger.warn("Telegram startup call failed, retrying.", {
        label,
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs,
        error: describeError(error),
      });
      await wait(delayMs);
    }
  }
};

/** Rewraps 401/404 from Telegram, which mean the bot token is wrong. */
export const explainTelegramAuthError = (error: unknown) => {
  if (error instanceof GrammyError && (error.error_code === 401 || error.error_code === 404)) {
    return new Error(
      "Telegram rejected the bot token. Check TELEGRAM_BOT_TOKEN (invalid token or bot no longer exists).",
      { cause: error },
    );
  }
  return error;
};

import { timingSafeEqual } from "node:crypto";

export const TELEGRAM_SECRET_HEADER = "x-telegram-bot-api-secret-token";

const secretsMatch = (provided: string, expected: string) => {
  const providedBuffer = Buffer.from(provided);
  const expectedBuffer = Buffer.from(expected);
  return (
    providedBuffer.length === expectedBuffer.length &&
    timingSafeEqual(providedBuffer, expectedBuffer)
  );
};

const decodePathSecret = (value: string) => {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
};

/**
 * Accepts the request when no secret is configured. Otherwise the secret must
 * arrive in Telegram's header, the path, or both (and then both must match).
 */
export const verifyWebhookSecret = (
  provided: { headerSecret: unknown; pathSecret?: string | undefined },
  expectedSecret: string | undefined,
) => {
  if (!expectedSecret) {
    return true;
  }

  const { headerSecret, pathSecret } = provided;
  const hasHeaderSecret =
    typeof headerSecret === "string" && headerSecret.length > 0;

  if (pathSecret) {
    const decoded = decodePathSecret(pathSecret);
    if (decoded === null || !secretsMatch(decoded, expectedSecret)) {
      return false;
    }
    return !hasHeaderSecret || secretsMatch(headerSecret, expectedSecret);
  }

  return hasHeaderSecret && secretsMatch(headerSecret, expectedSecret);
};

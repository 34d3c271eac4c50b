const REDACTED = "[REDACTED]";

type StringRule = {
  name: string;
  pattern: RegExp;
  replacement: string;
};

const STRING_RULES: ReadonlyArray<StringRule> = [
  {
    name: "telegram-token-in-url",
    pattern: /(\/bot)\d{6,}:[A-Za-z0-9_-]+/g,
    replacement: `$1${REDACTED}`,
  },
  {
    name: "telegram-token-query",
    pattern: /(bot_token=)[^&\s]+/gi,
    replacement: `$1${REDACTED}`,
  },
  {
    name: "bearer",
    pattern: /(Bearer\s+)[A-Za-z0-9._-]+/gi,
    replacement: `$1${REDACTED}`,
  },
  {
    name: "setkey-argument",
    pattern: /(\/setkey(?:@\w+)?\s+)\S+/gi,
    replacement: `$1${REDACTED}`,
  },
  {
    name: "provider-key",
    pattern: /\bsk-[A-Za-z0-9_-]{8,}/g,
    replacement: REDACTED,
  },
  {
    name: "opaque-blob",
    pattern: /[A-Za-z0-9+/]{32,}={0,2}/g,
    replacement: REDACTED,
  },
];

// Compared after lowercasing and dropping "_" and "-".
const SENSITIVE_KEY_NAMES = new Set([
  "token",
  "bottoken",
  "apikey",
  "authorization",
  "secret",
  "secrettoken",
  "webhooksecret",
  "telegramwebhooksecret",
  "telegrambottoken",
  "credentialencryptionkey",
  "ciphertext",
  "authtag",
]);

const isSensitiveKey = (key: string) =>
  SENSITIVE_KEY_NAMES.has(key.toLowerCase().replace(/[_-]/g, ""));

export const redactString = (value: string) =>
  STRING_RULES.reduce(
    (text, rule) => text.replace(rule.pattern, rule.replacement),
    value,
  );

const redactValue = (value: unknown, seen: WeakSet<object>): unknown => {
  if (typeof value === "string") {
    return redactString(value);
  }
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);

  if (value instanceof Error) {
    return { name: value.name, message: redactString(value.message) };
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, seen));
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, nested]) => [
      key,
      isSensitiveKey(key) ? REDACTED : redactValue(nested, seen),
    ]),
  );
};

/** Deep copy of `value` safe to hand to the log sink. */
export const redactForLogs = (value: unknown): unknown =>
  redactValue(value, new WeakSet());

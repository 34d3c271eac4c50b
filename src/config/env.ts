import { z } from "zod";
import type { BotRunMode } from "@/types/contracts";

export const SERVICE_NAME = "openrouter-telegram-relay";

const optionalNonEmptyString = z.preprocess(
  (value) => {
    if (typeof value !== "string") {
      return value;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  },
  z.string().min(1).optional(),
);

const optionalUrl = z.preprocess(
  (value) => {
    if (typeof value !== "string") {
      return value;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  },
  z.string().url().optional(),
);

const integerFromEnv = (input: {
  min: number;
  max: number;
  defaultValue: number;
}) =>
  z.preprocess(
    (value) => {
      if (typeof value === "number") {
        return Number.isFinite(value) ? Math.trunc(value) : value;
      }
      if (typeof value !== "string") {
        return value;
      }

      const trimmed = value.trim();
      if (trimmed.length === 0) {
        return undefined;
      }

      const parsed = Number(trimmed);
      return Number.isFinite(parsed) ? Math.trunc(parsed) : value;
    },
    z.number().int().min(input.min).max(input.max).default(input.defaultValue),
  );

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

const booleanFromEnv = (defaultValue: boolean) =>
  z.preprocess(
    (value) => {
      if (typeof value !== "string") {
        return value;
      }
      const normalized = value.trim().toLowerCase();
      if (normalized.length === 0) {
        return undefined;
      }
      if (TRUE_VALUES.has(normalized)) {
        return true;
      }
      return FALSE_VALUES.has(normalized) ? false : value;
    },
    z.boolean().default(defaultValue),
  );

const envSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),
    TELEGRAM_BOT_TOKEN: z
      .string({ required_error: "is required" })
      .regex(
        /^\d{6,}:[^\s:]{20,}$/,
        "must look like a BotFather token (digits:secret)",
      ),
    TELEGRAM_WEBHOOK_SECRET: optionalNonEmptyString,
    BOT_RUN_MODE: z.enum(["webhook", "polling"]).default("webhook"),
    APP_BASE_URL: optionalUrl,
    RENDER_EXTERNAL_URL: optionalUrl,
    PORT: integerFromEnv({
      min: 1,
      max: 65_535,
      defaultValue: 10_000,
    }),
    KEEPALIVE_URL: optionalUrl,
    KEEPALIVE_INTERVAL_SECONDS: integerFromEnv({
      min: 30,
      max: 86_400,
      defaultValue: 840,
    }),
    CREDENTIALS_DB_PATH: z.string().min(1).default("data/credentials.sqlite"),
    CREDENTIAL_ENCRYPTION_KEY: optionalNonEmptyString,
    OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
    AI_MODEL: z
      .string()
      .min(1)
      .default("mistralai/mistral-small-3.2-24b-instruct:free"),
    REPLY_MARKDOWN: booleanFromEnv(false),
    OTEL_EXPORTER_OTLP_ENDPOINT: optionalNonEmptyString,
  })
  .transform(({ RENDER_EXTERNAL_URL, ...rest }) => ({
    ...rest,
    APP_BASE_URL: rest.APP_BASE_URL ?? RENDER_EXTERNAL_URL,
  }))
  .superRefine((env, ctx) => {
    if (env.BOT_RUN_MODE === "webhook" && !env.APP_BASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["APP_BASE_URL"],
        message: "is required when BOT_RUN_MODE is webhook",
      });
    }
  });

export type AppEnv = z.infer<typeof envSchema> & {
  BOT_RUN_MODE: BotRunMode;
};

export const parseEnv = (source: Record<string, string | undefined>): AppEnv => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return parsed.data;
};

let cachedEnv: AppEnv | null = null;

export const getEnv = (): AppEnv => {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
};

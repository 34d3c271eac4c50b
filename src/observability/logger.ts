import pino, { type DestinationStream, type LevelWithSilent, type Logger } from "pino";
import { SERVICE_NAME } from "@/config/env";
import { redactForLogs } from "@/security/redaction";

const LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

const isLevel = (value: string): value is LevelWithSilent =>
  LEVELS.some((level) => level === value);

export type LoggerOptions = {
  level?: string | undefined;
  pretty?: boolean;
  destination?: DestinationStream;
};

const resolveLevel = (requested: string | undefined): LevelWithSilent => {
  const level = requested?.trim().toLowerCase();
  if (level && isLevel(level)) {
    return level;
  }
  // Silent under Vitest unless LOG_LEVEL is set.
  return process.env.NODE_ENV === "test" ? "silent" : "info";
};

const prettyByDefault = () => {
  const flag = process.env.LOG_PRETTY?.trim().toLowerCase();
  if (flag !== undefined) {
    return flag === "1" || flag === "true" || flag === "yes" || flag === "on";
  }
  return process.env.NODE_ENV !== "production" && process.stdout.isTTY === true;
};

type Metadata = Record<string, unknown>;

export interface AppLogger {
  debug(message: string, metadata?: Metadata): void;
  info(message: string, metadata?: Metadata): void;
  warn(message: string, metadata?: Metadata): void;
  error(message: string, metadata?: Metadata): void;
  /** Returns a logger that adds `bindings` to every line. */
  child(bindings: Metadata): AppLogger;
}

const wrap = (sink: Logger): AppLogger => {
  const write =
    (level: "debug" | "info" | "warn" | "error") =>
    (message: string, metadata?: Metadata) => {
      if (metadata === undefined) {
        sink[level](message);
        return;
      }
      sink[level]({ metadata: redactForLogs(metadata) }, message);
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
    child: (bindings) => wrap(sink.child({ context: redactForLogs(bindings) })),
  };
};

export const createLogger = (options: LoggerOptions = {}): AppLogger => {
  const pretty = options.pretty ?? prettyByDefault();
  const destination =
    options.destination ??
    (pretty
      ? pino.transport({
          target: "pino-pretty",
          options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
        })
      : undefined);

  return wrap(
    pino(
      {
        level: resolveLevel(options.level),
        base: { service: SERVICE_NAME },
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: { level: (label) => ({ level: label }) },
      },
      destination,
    ),
  );
};

export const logger = createLogger({ level: process.env.LOG_LEVEL });

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

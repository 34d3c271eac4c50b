import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";
import { SERVICE_NAME, type AppEnv } from "@/config/env";
import { describeError, logger } from "@/observability/logger";

const TRACES_PATH = "/v1/traces";
const HAS_SCHEME = /^[a-z][a-z\d+.-]*:\/\//i;

export type TelemetryHandle = {
  enabled: boolean;
  shutdown: () => Promise<void>;
};

const DISABLED: TelemetryHandle = {
  enabled: false,
  shutdown: async () => {},
};

/**
 * Normalizes OTEL_EXPORTER_OTLP_ENDPOINT to the OTLP/HTTP traces URL.
 * `collector:4318`, `https://host/base/` and `.../v1/traces` are all accepted.
 */
export const buildOtlpTracesUrl = (rawEndpoint: string) => {
  const endpoint = rawEndpoint.trim();
  if (endpoint.length === 0) {
    throw new Error("OTLP endpoint must be non-empty.");
  }

  const url = new URL(HAS_SCHEME.test(endpoint) ? endpoint : `http://${endpoint}`);
  const base = url.pathname.replace(/\/+$/, "");
  url.pathname = base.endsWith(TRACES_PATH) ? base : `${base}${TRACES_PATH}`;
  url.hash = "";
  return url.toString();
};

const startTracing = (tracesUrl: string, environment: string): TelemetryHandle => {
  const sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: SERVICE_NAME,
      [ATTR_SERVICE_VERSION]: process.env.npm_package_version ?? "0.0.0",
      "deployment.environment.name": environment,
    }),
    traceExporter: new OTLPTraceExporter({ url: tracesUrl }),
    instrumentations: [
      getNodeAutoInstrumentations({
        "@opentelemetry/instrumentation-fs": { enabled: false },
      }),
    ],
  });
  sdk.start();

  let flushed: Promise<void> | null = null;
  return {
    enabled: true,
    shutdown: () => {
      if (!flushed) {
        flushed = sdk.shutdown().catch((error: unknown) => {
          logger.error("Failed to shutdown OpenTelemetry SDK cleanly.", {
            error: describeError(error),
          });
        });
      }
      return flushed;
    },
  };
};

let active: TelemetryHandle | null = null;

/** Starts tracing once per process; a no-op handle when no endpoint is set. */
export const initTelemetry = (
  env: Pick<AppEnv, "OTEL_EXPORTER_OTLP_ENDPOINT" | "NODE_ENV">,
): TelemetryHandle => {
  if (active) {
    return active;
  }

  const endpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT;
  if (!endpoint) {
    logger.info("Telemetry exporter not configured; running without OTLP.");
    active = DISABLED;
    return active;
  }

  try {
    const tracesUrl = buildOtlpTracesUrl(endpoint);
    active = startTracing(tracesUrl, env.NODE_ENV);
    logger.info("Telemetry initialized.", { tracesUrl });
  } catch (error) {
    logger.error("Telemetry disabled: OpenTelemetry could not start.", {
      endpoint,
      error: describeError(error),
    });
    active = DISABLED;
  }
  return active;
};

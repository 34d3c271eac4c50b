import { getEnv } from "@/config/env";
import { describeError, logger } from "@/observability/logger";
import { initTelemetry, type TelemetryHandle } from "@/observability/telemetry";

let telemetry: TelemetryHandle | null = null;

const boot = async () => {
  const env = getEnv();
  telemetry = initTelemetry(env);
  // Loaded after telemetry so auto-instrumentation can patch fastify and undici.
  const { startRuntime } = await import("@/runtime");
  await startRuntime({
    env,
    telemetry,
  });
};

boot().catch(async (error: unknown) => {
  logger.error("Fatal startup error.", { error: describeError(error) });
  await telemetry?.shutdown();
  process.exit(1);
});

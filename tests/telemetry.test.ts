import { describe, expect, it } from "vitest";
import { buildOtlpTracesUrl, initTelemetry } from "@/observability/telemetry";

describe("buildOtlpTracesUrl", () => {
  it("builds the default OTLP HTTP traces path from a host endpoint", () => {
    expect(buildOtlpTracesUrl("http://localhost:4318")).toBe(
      "http://localhost:4318/v1/traces",
    );
  });

  it("preserves custom collector base path", () => {
    expect(buildOtlpTracesUrl("https://otel.example.com/collector/")).toBe(
      "https://otel.example.com/collector/v1/traces",
    );
  });

  it("keeps an explicit traces endpoint as is", () => {
    expect(buildOtlpTracesUrl("http://collector:4318/v1/traces")).toBe(
      "http://collector:4318/v1/traces",
    );
  });

  it("adds protocol when omitted", () => {
    expect(buildOtlpTracesUrl("collector:4318")).toBe("http://collector:4318/v1/traces");
  });

  it("throws on empty endpoint", () => {
    expect(() => buildOtlpTracesUrl("   ")).toThrow("OTLP endpoint must be non-empty.");
  });
});

describe("initTelemetry", () => {
  it("returns a disabled handle when no endpoint is configured", async () => {
    const handle = initTelemetry({ NODE_ENV: "test", OTEL_EXPORTER_OTLP_ENDPOINT: undefined });

    expect(handle.enabled).toBe(false);
    await expect(handle.shutdown()).resolves.toBeUndefined();
  });
});

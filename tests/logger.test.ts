import { describe, expect, it } from "vitest";
import { createLogger } from "@/observability/logger";

const captureLines = () => {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    destination: {
      write: (chunk: string) => {
        lines.push(JSON.parse(chunk));
      },
    },
  };
};

describe("createLogger", () => {
  it("writes labelled JSON lines with redacted metadata", () => {
    const { lines, destination } = captureLines();
    const log = createLogger({ level: "info", pretty: false, destination });

    log.info("API key set for user.", { userId: 123, apiKey: "sk-or-v1-0123456789abcdef" });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: "info",
      service: "openrouter-telegram-relay",
      msg: "API key set for user.",
      metadata: { userId: 123, apiKey: "[REDACTED]" },
    });
  });

  it("carries child bindings on every line", () => {
    const { lines, destination } = captureLines();
    const log = createLogger({ level: "debug", pretty: false, destination }).child({
      updateId: 7,
    });

    log.debug("first");
    log.warn("second", { chatId: 777 });

    expect(lines.map((line) => line.context)).toEqual([{ updateId: 7 }, { updateId: 7 }]);
    expect(lines[1]).toMatchObject({ level: "warn", metadata: { chatId: 777 } });
  });

  it("drops lines below the configured level", () => {
    const { lines, destination } = captureLines();
    const log = createLogger({ level: "warn", pretty: false, destination });

    log.info("ignored");
    log.error("kept");

    expect(lines.map((line) => line.msg)).toEqual(["kept"]);
  });
});

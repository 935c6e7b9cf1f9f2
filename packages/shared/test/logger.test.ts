import { describe, expect, it } from "vitest";
import { createLogger, parseLogLevel } from "../src/logger";

function capture(level?: "debug" | "info" | "warn" | "error") {
  const lines: string[] = [];
  const logger = createLogger({ component: "test" }, { level, sink: (line) => lines.push(line) });
  const entries = () => lines.map((line) => JSON.parse(line));
  return { lines, logger, entries };
}

describe("createLogger", () => {
  it("writes one JSON object per line with base and call fields", () => {
    const { lines, logger, entries } = capture();

    logger.info("tool.completed", { duration_ms: 12 });

    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith("\n")).toBe(true);
    expect(entries()[0]).toMatchObject({
      level: "info",
      message: "tool.completed",
      component: "test",
      pid: process.pid,
      duration_ms: 12,
    });
    expect(typeof entries()[0].time).toBe("string");
  });

  it("drops entries below the configured level", () => {
    const { logger, entries } = capture("warn");

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(entries().map((entry) => entry.message)).toEqual(["c", "d"]);
  });

  it("flattens errors passed as err", () => {
    const { logger, entries } = capture();

    logger.error("tool.failed", { err: new TypeError("bad input") });

    const entry = entries()[0];
    expect(entry).toMatchObject({ error_name: "TypeError", error_message: "bad input" });
    expect(entry.err).toBeUndefined();
  });

  it("children inherit level and sink and add fields", () => {
    const { logger, entries } = capture("info");
    const child = logger.child({ tool: "list_accounts" });

    child.debug("hidden");
    child.info("visible");

    expect(entries()).toHaveLength(1);
    expect(entries()[0]).toMatchObject({ component: "test", tool: "list_accounts", message: "visible" });
  });

  it("flush resolves for custom sinks", async () => {
    const { logger } = capture();
    await expect(logger.flush()).resolves.toBeUndefined();
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels case-insensitively and defaults to info", () => {
    expect(parseLogLevel("WARN")).toBe("warn");
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("verbose")).toBe("info");
  });
});

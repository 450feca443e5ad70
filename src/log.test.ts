import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { createLogger, describeError } from "./log.js";

const tempDirs: string[] = [];

function tempLogPath(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "llm-tui-log-"));
  tempDirs.push(dir);
  return path.join(dir, "nested", "llm-tui.log");
}

describe("createLogger", () => {
  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("drops records below the configured level", () => {
    const filePath = tempLogPath();
    const logger = createLogger({ level: "warn", filePath });
    logger.debug("bridge.spawn");
    logger.info("models.loaded", { count: 2 });
    logger.warn("bridge.timeout", { request: 1 });

    const records: unknown[] = fs
      .readFileSync(filePath, "utf8")
      .trimEnd()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(records).toEqual([expect.objectContaining({ level: "warn", stage: "bridge.timeout", data: { request: 1 } })]);
  });

  it("writes nothing without a log file", () => {
    const logger = createLogger({ level: "debug" });
    expect(() => logger.error("orchestrator.dispatch_failed", { event: "key" })).not.toThrow();
  });

  it("appends one JSON line per record to the log file", () => {
    const filePath = tempLogPath();
    const logger = createLogger({ level: "info", filePath });
    logger.info("remote.listening", { address: "127.0.0.1:8080" });
    logger.error("orchestrator.dispatch_failed");

    const lines = fs.readFileSync(filePath, "utf8").trimEnd().split("\n");
    const records: unknown[] = lines.map((line) => JSON.parse(line));
    expect(records).toEqual([
      expect.objectContaining({ level: "info", stage: "remote.listening", data: { address: "127.0.0.1:8080" } }),
      expect.objectContaining({ level: "error", stage: "orchestrator.dispatch_failed", data: null }),
    ]);
  });
});

describe("describeError", () => {
  it("prefers the error message", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("plain")).toBe("plain");
  });
});

import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("defaults to info", () => {
    const logger = createLogger({ json: true });
    expect(logger.level).toBe("info");
  });

  it("uses the configured level", () => {
    expect(createLogger({ level: "debug", json: true }).level).toBe("debug");
    expect(createLogger({ level: "silent", json: true }).level).toBe("silent");
  });

  it("child loggers inherit the level", () => {
    const logger = createLogger({ level: "warn", json: true });
    const child = logger.child({ component: "wrapped" });
    expect(child.level).toBe("warn");
  });

  it("writes JSON lines to a log file", () => {
    dir = mkdtempSync(join(tmpdir(), "wrapped-log-"));
    const file = join(dir, "wrapped.log");
    const logger = createLogger({ level: "info", file });

    logger.info({ rows: 3 }, "summary written");

    const line = readFileSync(file, "utf-8").trim();
    const entry: unknown = JSON.parse(line);
    expect(entry).toMatchObject({ level: 30, rows: 3, msg: "summary written" });
  });
});

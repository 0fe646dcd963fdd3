import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  readSummary,
  serializeSummary,
  writeArtifact,
  writeSummary,
} from "../../src/summary/store.js";
import {
  InvalidSummaryError,
  SerializationError,
  SourceUnavailableError,
} from "../../src/utils/errors.js";
import { sampleSummary } from "../helpers/fixtures.js";

describe("summary store", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "wrapped-store-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("serializes with two-space indentation and a trailing newline", () => {
    const text = serializeSummary(sampleSummary());
    expect(text.startsWith('{\n  "version": 1,\n  "generatedAt": "2025-12-31T12:00:00.000Z",')).toBe(true);
    expect(text.endsWith("}\n")).toBe(true);
  });

  it("writes a summary that reads back identically", async () => {
    const summary = sampleSummary();
    const path = await writeSummary(join(dir, "nested", "summary.json"), summary);

    expect(path).toBe(join(dir, "nested", "summary.json"));
    expect(readFileSync(path, "utf-8")).toBe(serializeSummary(summary));
    await expect(readSummary(path)).resolves.toEqual(summary);
  });

  it("raises SerializationError when the target cannot be created", async () => {
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "");

    const target = join(blocker, "summary.json");
    await expect(writeArtifact(target, "{}")).rejects.toThrow(SerializationError);
    await expect(writeArtifact(target, "{}")).rejects.toThrow(`Failed to write ${target}: `);
  });

  it("reports a missing summary as unavailable", async () => {
    const path = join(dir, "absent.json");
    await expect(readSummary(path)).rejects.toThrow(SourceUnavailableError);
    await expect(readSummary(path)).rejects.toThrow(
      `Cannot read usage data from ${path}: file not found`,
    );
  });

  it("rejects a file that is not JSON", async () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ nope");
    await expect(readSummary(path)).rejects.toThrow(InvalidSummaryError);
  });

  it("rejects JSON that is not a summary", async () => {
    const path = join(dir, "other.json");
    writeFileSync(path, JSON.stringify({ version: 1 }));
    await expect(readSummary(path)).rejects.toThrow(InvalidSummaryError);
  });
});

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { InvalidSummaryError, SerializationError, SourceUnavailableError, errnoCode, errorMessage } from "../utils/errors.js";
import { parseSummary } from "./schema.js";
import type { UsageSummary } from "./types.js";

export function serializeSummary(summary: UsageSummary): string {
  return JSON.stringify(summary, null, 2) + "\n";
}

/** Write a text artifact, creating its directory. Any failure is a SerializationError. */
export async function writeArtifact(path: string, content: string): Promise<string> {
  const target = resolve(path);
  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, "utf-8");
  } catch (error) {
    throw new SerializationError(target, error);
  }
  return target;
}

export async function writeSummary(path: string, summary: UsageSummary): Promise<string> {
  return writeArtifact(path, serializeSummary(summary));
}

/** Load a previously written summary and check it against the schema. */
export async function readSummary(path: string): Promise<UsageSummary> {
  const target = resolve(path);

  let content: string;
  try {
    content = await readFile(target, "utf-8");
  } catch (error) {
    const code = errnoCode(error);
    throw new SourceUnavailableError(
      target,
      code === "ENOENT" ? "file not found" : errorMessage(error),
      error,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new InvalidSummaryError([`not valid JSON (${errorMessage(error)})`], error);
  }
  return parseSummary(raw);
}

import { Writable } from "node:stream";
import { parseTimestamp } from "../../src/events/timestamp.js";
import type { SourceRow, UsageEvent } from "../../src/events/types.js";
import type { WrappedConfig } from "../../src/config/types.js";
import { aggregate } from "../../src/aggregate/engine.js";
import type { UsageSummary } from "../../src/summary/types.js";
import { parseConfig } from "../../src/config/schema.js";

export interface EventSpec {
  readonly timestamp?: string;
  readonly model?: string;
  readonly kind?: string | null;
  readonly inputTokens?: number;
  readonly outputTokens?: number;
  readonly cacheReadTokens?: number;
  readonly cacheWriteTokens?: number;
  readonly costMicros?: number;
  readonly cacheHit?: boolean;
}

export function makeEvent(spec: EventSpec = {}): UsageEvent {
  const timestamp = spec.timestamp ?? "2025-03-10T14:30:00.000Z";
  const time = parseTimestamp(timestamp);
  if (!time) throw new Error(`bad fixture timestamp: ${timestamp}`);
  const inputTokens = spec.inputTokens ?? 0;
  const outputTokens = spec.outputTokens ?? 0;
  const cacheReadTokens = spec.cacheReadTokens ?? 0;
  const cacheWriteTokens = spec.cacheWriteTokens ?? 0;
  return {
    timestamp,
    time,
    model: spec.model ?? "test-model",
    kind: spec.kind === undefined ? "Included" : spec.kind,
    maxMode: null,
    inputTokens,
    outputTokens,
    cacheReadTokens,
    cacheWriteTokens,
    totalTokens: inputTokens + outputTokens + cacheReadTokens + cacheWriteTokens,
    costMicros: spec.costMicros ?? 0,
    cacheHit: spec.cacheHit ?? cacheReadTokens > 0,
  };
}

/** An event whose token total is exactly `tokens` (all counted as output). */
export function eventWithTokens(tokens: number, spec: EventSpec = {}): UsageEvent {
  return makeEvent({ ...spec, outputTokens: tokens });
}

export function makeRow(fields: Record<string, string>, row = 1): SourceRow {
  return {
    row,
    fields: {
      Date: "2025-03-10T14:30:00.000Z",
      Kind: "Included",
      Model: "test-model",
      "Max Mode": "No",
      "Input (w/ Cache Write)": "0",
      "Input (w/o Cache Write)": "100",
      "Cache Read": "0",
      "Output Tokens": "50",
      "Total Tokens": "150",
      Cost: "0.01",
      ...fields,
    },
  };
}

export function makeConfig(overrides: Record<string, unknown> = {}): WrappedConfig {
  return parseConfig({ logging: { level: "silent", json: true }, ...overrides });
}

export function captureStream(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      buf += String(chunk);
      cb();
    },
  });
  return { stream, output: () => buf };
}

export const CSV_HEADER =
  "Date,Kind,Model,Max Mode,Input (w/ Cache Write),Input (w/o Cache Write),Cache Read,Output Tokens,Total Tokens,Cost";

/**
 * Three events over 2025-03-10 (Monday) and 2025-03-12: 6000 tokens, $2.00,
 * two models, one cache hit.
 */
export function sampleEvents(): UsageEvent[] {
  return [
    makeEvent({
      timestamp: "2025-03-10T14:30:00Z",
      model: "claude-4-sonnet",
      inputTokens: 1000,
      outputTokens: 500,
      cacheReadTokens: 2000,
      costMicros: 500_000,
    }),
    makeEvent({
      timestamp: "2025-03-10T15:10:00Z",
      model: "claude-4-sonnet",
      inputTokens: 200,
      outputTokens: 300,
      costMicros: 250_000,
    }),
    makeEvent({
      timestamp: "2025-03-12T14:05:00Z",
      model: "gpt-5",
      inputTokens: 1500,
      outputTokens: 500,
      costMicros: 1_250_000,
    }),
  ];
}

export function sampleSummary(): UsageSummary {
  return aggregate(sampleEvents(), { generatedAt: "2025-12-31T12:00:00.000Z" });
}

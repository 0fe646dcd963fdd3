import { z } from "zod";
import { DEFAULT_COLUMNS } from "../events/types.js";
import type { WrappedConfig } from "./types.js";

export const presenterNameSchema = z.enum(["console", "terminal", "html"]);

const columnsSchema = z.object({
  timestamp: z.string().min(1).default(DEFAULT_COLUMNS.timestamp),
  model: z.string().min(1).default(DEFAULT_COLUMNS.model),
  kind: z.string().min(1).default(DEFAULT_COLUMNS.kind),
  maxMode: z.string().min(1).default(DEFAULT_COLUMNS.maxMode),
  inputTokens: z.string().min(1).default(DEFAULT_COLUMNS.inputTokens),
  outputTokens: z.string().min(1).default(DEFAULT_COLUMNS.outputTokens),
  cacheReadTokens: z.string().min(1).default(DEFAULT_COLUMNS.cacheReadTokens),
  cacheWriteTokens: z.string().min(1).default(DEFAULT_COLUMNS.cacheWriteTokens),
  cost: z.string().min(1).default(DEFAULT_COLUMNS.cost),
  cacheHit: z.string().min(1).default(DEFAULT_COLUMNS.cacheHit),
});

const inputSchema = z.object({
  path: z.string().min(1).default("usage-events.csv"),
  delimiter: z.string().length(1).default(","),
  columns: columnsSchema.default({}),
  kinds: z.array(z.string().min(1)).optional(),
  dropZeroTokens: z.boolean().default(false),
});

const outputSchema = z.object({
  summaryPath: z.string().min(1).default("wrapped-summary.json"),
  htmlPath: z.string().min(1).optional(),
});

export const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const loggingSchema = z.object({
  level: logLevelSchema.default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const wrappedConfigSchema = z.object({
  input: inputSchema.default({}),
  output: outputSchema.default({}),
  presenters: z.array(presenterNameSchema).default(["console"]),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): WrappedConfig {
  return wrappedConfigSchema.parse(raw);
}

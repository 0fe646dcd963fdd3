import { MalformedRecordError } from "../utils/errors.js";
import { err, ok, type Result } from "../utils/result.js";
import { parseCostMicros } from "./cost.js";
import { parseTimestamp } from "./timestamp.js";
import type { ColumnMap, SourceRow, UsageEvent } from "./types.js";

const TRUE_VALUES = new Set(["true", "yes", "y", "1"]);
const FALSE_VALUES = new Set(["false", "no", "n", "0"]);
const COUNT_PATTERN = /^[+-]?\d+$/;

function cell(row: SourceRow, column: string): string {
  return (row.fields[column] ?? "").trim();
}

function parseFlag(value: string): boolean | null {
  const normalized = value.toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return null;
}

function parseCount(
  row: SourceRow,
  column: string,
): Result<number, MalformedRecordError> {
  const text = cell(row, column).replace(/,/g, "");
  if (text === "") return ok(0);
  if (!COUNT_PATTERN.test(text)) {
    return err(new MalformedRecordError(row.row, column, `is not an integer: "${text}"`));
  }
  const value = Number(text);
  if (value < 0) {
    return err(new MalformedRecordError(row.row, column, `is negative: ${text}`));
  }
  if (!Number.isSafeInteger(value)) {
    return err(new MalformedRecordError(row.row, column, `is out of range: ${text}`));
  }
  return ok(value);
}

/**
 * Turn one decoded source row into a usage event, or name the first field
 * that makes it unusable.
 *
 * Cache hit comes from the explicit cache-hit column when the row has a value
 * there, otherwise from a non-zero cache-read count.
 */
export function validateRow(
  row: SourceRow,
  columns: ColumnMap,
): Result<UsageEvent, MalformedRecordError> {
  const timestamp = cell(row, columns.timestamp).replace(/^"+|"+$/g, "");
  if (timestamp === "") {
    return err(new MalformedRecordError(row.row, columns.timestamp, "is missing"));
  }
  const time = parseTimestamp(timestamp);
  if (!time) {
    return err(
      new MalformedRecordError(row.row, columns.timestamp, `is not a valid timestamp: "${timestamp}"`),
    );
  }

  const counts = {
    inputTokens: parseCount(row, columns.inputTokens),
    outputTokens: parseCount(row, columns.outputTokens),
    cacheReadTokens: parseCount(row, columns.cacheReadTokens),
    cacheWriteTokens: parseCount(row, columns.cacheWriteTokens),
  };
  if (!counts.inputTokens.ok) return counts.inputTokens;
  if (!counts.outputTokens.ok) return counts.outputTokens;
  if (!counts.cacheReadTokens.ok) return counts.cacheReadTokens;
  if (!counts.cacheWriteTokens.ok) return counts.cacheWriteTokens;

  const inputTokens = counts.inputTokens.value;
  const outputTokens = counts.outputTokens.value;
  const cacheReadTokens = counts.cacheReadTokens.value;
  const cacheWriteTokens = counts.cacheWriteTokens.value;

  const costText = cell(row, columns.cost);
  const cost = parseCostMicros(costText);
  if (!cost.ok) {
    return err(new MalformedRecordError(row.row, columns.cost, `is ${cost.reason}: "${costText}"`));
  }

  let cacheHit = cacheReadTokens > 0;
  const cacheHitText = cell(row, columns.cacheHit);
  if (cacheHitText !== "") {
    const flag = parseFlag(cacheHitText);
    if (flag === null) {
      return err(
        new MalformedRecordError(row.row, columns.cacheHit, `is not a boolean: "${cacheHitText}"`),
      );
    }
    cacheHit = flag;
  }

  const kind = cell(row, columns.kind);
  const maxMode = cell(row, columns.maxMode);

  return ok({
    timestamp,
    time,
    model: cell(row, columns.model) || "unknown",
    kind: kind === "" ? null : kind,
    maxMode: maxMode === "" ? null : parseFlag(maxMode),
    inputTokens,
    outputTokens,
    cacheReadTokens,
    cacheWriteTokens,
    totalTokens: inputTokens + outputTokens + cacheReadTokens + cacheWriteTokens,
    costMicros: cost.micros,
    cacheHit,
  });
}

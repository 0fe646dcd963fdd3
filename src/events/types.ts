/** Wall-clock fields of a timestamp, read in the offset the timestamp states. */
export interface EventTime {
  /** Epoch milliseconds; offset-less timestamps are read as UTC. Ordering only. */
  readonly instant: number;
  readonly date: string; // YYYY-MM-DD
  readonly month: string; // YYYY-MM
  readonly year: number;
  readonly hour: number; // 0-23
  readonly dayOfMonth: number; // 1-31
  readonly weekday: number; // 0 = Sunday
}

export interface UsageEvent {
  readonly timestamp: string;
  readonly time: EventTime;
  readonly model: string;
  readonly kind: string | null;
  readonly maxMode: boolean | null;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly cacheReadTokens: number;
  readonly cacheWriteTokens: number;
  readonly totalTokens: number;
  readonly costMicros: number;
  readonly cacheHit: boolean;
}

/** One data row as the source decoded it, before validation. */
export interface SourceRow {
  /** 1-based data row number (the header is not counted). */
  readonly row: number;
  readonly fields: Readonly<Record<string, string | undefined>>;
}

/** Header names of each event field in the source export. */
export interface ColumnMap {
  readonly timestamp: string;
  readonly model: string;
  readonly kind: string;
  readonly maxMode: string;
  readonly inputTokens: string;
  readonly outputTokens: string;
  readonly cacheReadTokens: string;
  readonly cacheWriteTokens: string;
  readonly cost: string;
  readonly cacheHit: string;
}

export const DEFAULT_COLUMNS: ColumnMap = {
  timestamp: "Date",
  model: "Model",
  kind: "Kind",
  maxMode: "Max Mode",
  inputTokens: "Input (w/o Cache Write)",
  outputTokens: "Output Tokens",
  cacheReadTokens: "Cache Read",
  cacheWriteTokens: "Input (w/ Cache Write)",
  cost: "Cost",
  cacheHit: "Cache Hit",
};

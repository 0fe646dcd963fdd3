export const SUMMARY_VERSION = 1;

export interface BucketCount<K extends number | string> {
  readonly key: K;
  readonly events: number;
  readonly tokens: number;
}

export interface SourceStats {
  readonly rows: number;
  readonly events: number;
  readonly skipped: number;
  readonly filtered: number;
}

export interface Totals {
  readonly events: number;
  readonly tokens: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly cacheReadTokens: number;
  readonly cacheWriteTokens: number;
  readonly cost: number;
}

export interface TimeSpan {
  readonly first: string;
  readonly last: string;
  readonly daysActive: number;
  readonly calendarDays: number;
}

export interface DailyAverages {
  readonly tokens: number;
  readonly events: number;
  readonly cost: number;
}

export interface ModelUsage {
  readonly model: string;
  readonly events: number;
  readonly tokens: number;
  readonly cost: number;
  readonly tokenShare: number;
}

export interface Peaks {
  readonly hour: BucketCount<number>;
  readonly weekday: BucketCount<number>;
  readonly dayOfMonth: BucketCount<number>;
  readonly date: BucketCount<string>;
  readonly month: BucketCount<string>;
}

export interface Buckets {
  readonly hour: readonly BucketCount<number>[];
  readonly weekday: readonly BucketCount<number>[];
  readonly dayOfMonth: readonly BucketCount<number>[];
  readonly date: readonly BucketCount<string>[];
  readonly month: readonly BucketCount<string>[];
}

export interface CacheStats {
  readonly hits: number;
  readonly hitRate: number;
  readonly tokensSaved: number;
  /** Cache-read tokens over all input tokens, summed across events. */
  readonly readShare: number;
  /** Mean of that share per event, over events with any input. */
  readonly efficiency: number;
}

export interface TokenStats {
  readonly mean: number;
  readonly median: number;
  readonly max: number;
  readonly min: number;
}

/** The single output document of a run. Presenters treat it as read-only. */
export interface UsageSummary {
  readonly version: typeof SUMMARY_VERSION;
  readonly generatedAt: string | null;
  readonly year: number;
  readonly source: SourceStats;
  readonly totals: Totals;
  readonly span: TimeSpan;
  readonly daily: DailyAverages;
  readonly models: readonly ModelUsage[];
  readonly peaks: Peaks;
  readonly buckets: Buckets;
  readonly cache: CacheStats;
  readonly tokens: TokenStats;
}

import { microsToAmount } from "../events/cost.js";
import { DEFAULT_COLUMNS, type ColumnMap, type SourceRow, type UsageEvent } from "../events/types.js";
import { validateRow } from "../events/validate.js";
import { validateSummary } from "../summary/schema.js";
import { SUMMARY_VERSION, type ModelUsage, type UsageSummary } from "../summary/types.js";
import { EmptyInputError, type MalformedRecordError } from "../utils/errors.js";
import { BucketTally, compareModels, mean, median, pickPeak, range, ratio } from "./stats.js";

const MS_PER_DAY = 86_400_000;
const HOURS = range(0, 23);
const WEEKDAYS = range(0, 6);
const DAYS_OF_MONTH = range(1, 31);

export interface AggregateOptions {
  readonly skipped?: number;
  readonly filtered?: number;
  readonly generatedAt?: string | null;
}

export interface EventFilters {
  /** Keep only events whose kind is listed. */
  readonly kinds?: readonly string[];
  readonly dropZeroTokens?: boolean;
}

export interface AggregateRowsOptions {
  readonly columns?: ColumnMap;
  readonly filters?: EventFilters;
  readonly generatedAt?: string | null;
  readonly onMalformed?: (error: MalformedRecordError) => void;
}

function compareMoments(a: UsageEvent, b: UsageEvent): number {
  if (a.time.instant !== b.time.instant) return a.time.instant - b.time.instant;
  if (a.timestamp === b.timestamp) return 0;
  return a.timestamp < b.timestamp ? -1 : 1;
}

function dayCount(firstDate: string, lastDate: string): number {
  return Math.round((Date.parse(lastDate) - Date.parse(firstDate)) / MS_PER_DAY) + 1;
}

/**
 * Reduce a sequence of valid events to one summary.
 *
 * Pure: the same events in any order, with the same options, give an
 * identical summary. Throws EmptyInputError for an empty sequence.
 */
export function aggregate(
  events: readonly UsageEvent[],
  opts: AggregateOptions = {},
): UsageSummary {
  const skipped = opts.skipped ?? 0;
  const filtered = opts.filtered ?? 0;
  const [head] = events;
  if (!head) throw new EmptyInputError(skipped, filtered);

  let first = head;
  let last = head;
  let tokens = 0;
  let inputTokens = 0;
  let outputTokens = 0;
  let cacheReadTokens = 0;
  let cacheWriteTokens = 0;
  let costMicros = 0;
  let hits = 0;
  let max = 0;
  let min = Number.POSITIVE_INFINITY;

  const perEvent: number[] = [];
  const readRatios: number[] = [];
  const models = new Map<string, { events: number; tokens: number; costMicros: number }>();
  const hours = new BucketTally<number>();
  const weekdays = new BucketTally<number>();
  const daysOfMonth = new BucketTally<number>();
  const dates = new BucketTally<string>();
  const months = new BucketTally<string>();

  for (const event of events) {
    if (compareMoments(event, first) < 0) first = event;
    if (compareMoments(event, last) > 0) last = event;

    tokens += event.totalTokens;
    inputTokens += event.inputTokens;
    outputTokens += event.outputTokens;
    cacheReadTokens += event.cacheReadTokens;
    cacheWriteTokens += event.cacheWriteTokens;
    costMicros += event.costMicros;
    if (event.cacheHit) hits += 1;
    max = Math.max(max, event.totalTokens);
    min = Math.min(min, event.totalTokens);
    perEvent.push(event.totalTokens);
    const inputSide = event.inputTokens + event.cacheWriteTokens + event.cacheReadTokens;
    if (inputSide > 0) readRatios.push(event.cacheReadTokens / inputSide);

    const model = models.get(event.model);
    if (model) {
      model.events += 1;
      model.tokens += event.totalTokens;
      model.costMicros += event.costMicros;
    } else {
      models.set(event.model, {
        events: 1,
        tokens: event.totalTokens,
        costMicros: event.costMicros,
      });
    }

    hours.add(event.time.hour, event.totalTokens);
    weekdays.add(event.time.weekday, event.totalTokens);
    daysOfMonth.add(event.time.dayOfMonth, event.totalTokens);
    dates.add(event.time.date, event.totalTokens);
    months.add(event.time.month, event.totalTokens);
  }

  const count = events.length;
  const daysActive = dates.size;

  const modelUsage: ModelUsage[] = [...models.entries()]
    .map(([name, m]) => ({
      model: name,
      events: m.events,
      tokens: m.tokens,
      cost: microsToAmount(m.costMicros),
      tokenShare: ratio(m.tokens, tokens),
    }))
    .sort(compareModels);

  const hourBuckets = hours.list(HOURS);
  const weekdayBuckets = weekdays.list(WEEKDAYS);
  const dayOfMonthBuckets = daysOfMonth.list(DAYS_OF_MONTH);
  const dateBuckets = dates.list();
  const monthBuckets = months.list();

  const firstDate = dateBuckets[0]?.key ?? first.time.date;
  const lastDate = dateBuckets[dateBuckets.length - 1]?.key ?? last.time.date;

  return validateSummary({
    version: SUMMARY_VERSION,
    generatedAt: opts.generatedAt ?? null,
    year: last.time.year,
    source: { rows: count + skipped + filtered, events: count, skipped, filtered },
    totals: {
      events: count,
      tokens,
      inputTokens,
      outputTokens,
      cacheReadTokens,
      cacheWriteTokens,
      cost: microsToAmount(costMicros),
    },
    span: {
      first: first.timestamp,
      last: last.timestamp,
      daysActive,
      calendarDays: dayCount(firstDate, lastDate),
    },
    daily: {
      tokens: tokens / daysActive,
      events: count / daysActive,
      cost: microsToAmount(Math.round(costMicros / daysActive)),
    },
    models: modelUsage,
    peaks: {
      hour: pickPeak(hourBuckets),
      weekday: pickPeak(weekdayBuckets),
      dayOfMonth: pickPeak(dayOfMonthBuckets),
      date: pickPeak(dateBuckets),
      month: pickPeak(monthBuckets),
    },
    buckets: {
      hour: hourBuckets,
      weekday: weekdayBuckets,
      dayOfMonth: dayOfMonthBuckets,
      date: dateBuckets,
      month: monthBuckets,
    },
    cache: {
      hits,
      hitRate: ratio(hits, count),
      tokensSaved: cacheReadTokens,
      readShare: ratio(cacheReadTokens, inputTokens + cacheWriteTokens + cacheReadTokens),
      // Sorted so the float sum does not depend on input order.
      efficiency: readRatios.length > 0 ? mean(readRatios.sort((a, b) => a - b)) : 0,
    },
    tokens: {
      mean: mean(perEvent),
      median: median(perEvent),
      max,
      min,
    },
  });
}

function passesFilters(event: UsageEvent, filters: EventFilters): boolean {
  if (filters.kinds && filters.kinds.length > 0) {
    if (event.kind === null || !filters.kinds.includes(event.kind)) return false;
  }
  if (filters.dropZeroTokens && event.totalTokens === 0) return false;
  return true;
}

/**
 * Validate raw source rows and aggregate the usable ones. Malformed rows are
 * reported through `onMalformed`, counted as skipped and left out of every
 * aggregate; rows dropped by filters are counted as filtered.
 */
export function aggregateRows(
  rows: readonly SourceRow[],
  opts: AggregateRowsOptions = {},
): UsageSummary {
  const columns = opts.columns ?? DEFAULT_COLUMNS;
  const filters = opts.filters ?? {};
  const events: UsageEvent[] = [];
  let skipped = 0;
  let filtered = 0;

  for (const row of rows) {
    const result = validateRow(row, columns);
    if (!result.ok) {
      skipped += 1;
      opts.onMalformed?.(result.error);
      continue;
    }
    if (!passesFilters(result.value, filters)) {
      filtered += 1;
      continue;
    }
    events.push(result.value);
  }

  return aggregate(events, { skipped, filtered, generatedAt: opts.generatedAt });
}

import { z } from "zod";
import { InvalidSummaryError } from "../utils/errors.js";
import { SUMMARY_VERSION, type UsageSummary } from "./types.js";

const count = z.number().int().nonnegative();
const amount = z.number().finite().nonnegative();
const rate = z.number().min(0).max(1);

const numericBucketSchema = z.object({ key: count, events: count, tokens: count });
const stringBucketSchema = z.object({ key: z.string().min(1), events: count, tokens: count });

const modelUsageSchema = z.object({
  model: z.string().min(1),
  events: count,
  tokens: count,
  cost: amount,
  tokenShare: rate,
});

export const usageSummarySchema = z
  .object({
    version: z.literal(SUMMARY_VERSION),
    generatedAt: z.string().nullable(),
    year: z.number().int(),
    source: z.object({ rows: count, events: count, skipped: count, filtered: count }),
    totals: z.object({
      events: count,
      tokens: count,
      inputTokens: count,
      outputTokens: count,
      cacheReadTokens: count,
      cacheWriteTokens: count,
      cost: amount,
    }),
    span: z.object({
      first: z.string().min(1),
      last: z.string().min(1),
      daysActive: count,
      calendarDays: count,
    }),
    daily: z.object({ tokens: amount, events: amount, cost: amount }),
    models: z.array(modelUsageSchema),
    peaks: z.object({
      hour: numericBucketSchema,
      weekday: numericBucketSchema,
      dayOfMonth: numericBucketSchema,
      date: stringBucketSchema,
      month: stringBucketSchema,
    }),
    buckets: z.object({
      hour: z.array(numericBucketSchema).length(24),
      weekday: z.array(numericBucketSchema).length(7),
      dayOfMonth: z.array(numericBucketSchema).length(31),
      date: z.array(stringBucketSchema),
      month: z.array(stringBucketSchema),
    }),
    cache: z.object({ hits: count, hitRate: rate, tokensSaved: count, readShare: rate, efficiency: rate }),
    tokens: z.object({ mean: amount, median: amount, max: count, min: count }),
  })
  .superRefine((summary, ctx) => {
    if (summary.totals.events > 0 && summary.models.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["models"],
        message: "must not be empty when there are events",
      });
    }
    if (summary.source.events !== summary.totals.events) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["source", "events"],
        message: "must equal totals.events",
      });
    }
    const { rows, events, skipped, filtered } = summary.source;
    if (rows !== events + skipped + filtered) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["source", "rows"],
        message: "must equal events + skipped + filtered",
      });
    }
    if (summary.cache.hits > summary.totals.events) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["cache", "hits"],
        message: "must not exceed totals.events",
      });
    }
  });

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/** Parse an untrusted value (e.g. a reloaded summary file) into a summary. */
export function parseSummary(raw: unknown): UsageSummary {
  const result = usageSummarySchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidSummaryError(describeIssues(result.error), result.error);
  }
  return result.data;
}

/** Check a freshly built summary before presenters see it. */
export function validateSummary(summary: UsageSummary): UsageSummary {
  parseSummary(summary);
  return summary;
}

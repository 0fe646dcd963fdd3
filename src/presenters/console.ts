import type { Writable } from "node:stream";
import type { UsageSummary } from "../summary/types.js";
import {
  formatCost,
  formatHour,
  formatInteger,
  formatLongDate,
  formatNumber,
  formatPercent,
  prettyModelName,
  weekdayName,
} from "./format.js";
import type { Presenter } from "./types.js";

const RULE = "=".repeat(60);

export function renderConsoleReport(summary: UsageSummary): string[] {
  const { totals, span, daily, peaks, cache, tokens } = summary;
  const lines: string[] = [
    "",
    RULE,
    `${" ".repeat(15)}USAGE WRAPPED ${summary.year}`,
    RULE,
    "",
    "📅 Your Year in Review",
    `   ${formatLongDate(span.first)} → ${formatLongDate(span.last)}`,
    `   ${span.daysActive} days active out of ${span.calendarDays}`,
    "",
    "🎯 Total Activity",
    `   ${formatInteger(totals.events)} requests`,
    `   ${formatNumber(totals.tokens)} tokens processed`,
    `   ${formatNumber(daily.tokens)} tokens per day`,
  ];
  if (summary.source.skipped > 0) {
    lines.push(`   ${formatInteger(summary.source.skipped)} malformed rows skipped`);
  }

  lines.push("", "💰 Total Cost", `   ${formatCost(totals.cost)}`, "", "🤖 Your Top Models");
  summary.models.slice(0, 3).forEach((model, i) => {
    lines.push(`   ${i + 1}. ${prettyModelName(model.model)}`);
    lines.push(
      `      ${formatInteger(model.events)} requests, ` +
        `${formatNumber(model.tokens)} tokens (${formatPercent(model.tokenShare)})`,
    );
  });

  lines.push(
    "",
    "⏰ Peak Coding Hour",
    `   ${formatHour(peaks.hour.key)} was your busiest hour`,
    `   ${formatInteger(peaks.hour.events)} requests, ${formatNumber(peaks.hour.tokens)} tokens`,
    "",
    "📆 Busiest Weekday",
    `   ${weekdayName(peaks.weekday.key)}`,
    `   ${formatInteger(peaks.weekday.events)} requests`,
    "",
    "🔥 Peak Day",
    `   ${formatLongDate(peaks.date.key)}`,
    `   ${formatInteger(peaks.date.events)} requests, ${formatNumber(peaks.date.tokens)} tokens`,
    "",
    "💾 Cache Efficiency",
    `   ${formatPercent(cache.hitRate)} cache hit rate`,
    `   ${formatNumber(cache.tokensSaved)} tokens from cache`,
    "",
    "📊 Token Statistics",
    `   Average: ${formatNumber(tokens.mean)} tokens per request`,
    `   Median: ${formatNumber(tokens.median)} tokens`,
    `   Largest: ${formatNumber(tokens.max)} tokens`,
    "",
    RULE,
    "",
  );
  return lines;
}

/** The plain "wrapped" report, written to a stream (stdout in the CLI). */
export class ConsolePresenter implements Presenter {
  readonly name = "console" as const;

  constructor(private readonly out: Writable) {}

  async render(summary: UsageSummary): Promise<void> {
    this.out.write(renderConsoleReport(summary).join("\n") + "\n");
  }
}

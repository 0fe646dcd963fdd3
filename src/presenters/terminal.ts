import type { Writable } from "node:stream";
import type { UsageSummary } from "../summary/types.js";
import {
  formatCost,
  formatHour,
  formatInteger,
  formatLongDate,
  formatMonth,
  formatNumber,
  formatPercent,
  ordinal,
  prettyModelName,
  weekdayName,
} from "./format.js";
import type { Presenter } from "./types.js";

export const DEFAULT_BOX_WIDTH = 70;

function fit(text: string, width: number): string {
  return text.length > width ? text.slice(0, width) : text.padEnd(width);
}

export function box(title: string, content: readonly string[], width = DEFAULT_BOX_WIDTH): string[] {
  const inner = width - 4;
  const bar = "─".repeat(width - 2);
  return [
    `┌${bar}┐`,
    `│ ${fit(title, inner)} │`,
    `├${bar}┤`,
    ...content.map((line) => `│ ${fit(line, inner)} │`),
    `└${bar}┘`,
    "",
  ];
}

function center(text: string, width: number): string {
  const pad = Math.max(0, Math.floor((width - text.length) / 2));
  return " ".repeat(pad) + text;
}

export function renderTerminalReport(summary: UsageSummary, width = DEFAULT_BOX_WIDTH): string[] {
  const { totals, span, daily, peaks, cache, tokens } = summary;
  const rule = "=".repeat(width);

  const models = summary.models.slice(0, 5).map(
    (model, i) =>
      `${i + 1}. ${prettyModelName(model.model).padEnd(25)} ` +
      `${formatNumber(model.tokens).padStart(12)} (${formatPercent(model.tokenShare).padStart(6)})`,
  );

  return [
    "",
    rule,
    center(`USAGE WRAPPED ${summary.year}`, width),
    center("Your Year in Review", width),
    rule,
    "",
    ...box("TOTAL ACTIVITY", [
      `Total Requests:      ${formatInteger(totals.events)}`,
      `Total Tokens:        ${formatNumber(totals.tokens)}`,
      `Days Active:         ${span.daysActive} days`,
      `Date Range:          ${formatLongDate(span.first)} to ${formatLongDate(span.last)}`,
    ], width),
    ...box("DAILY STATISTICS", [
      `Tokens per Day:      ${formatNumber(daily.tokens)}`,
      `Average per Request: ${formatNumber(tokens.mean)}`,
      `Median per Request:  ${formatNumber(tokens.median)}`,
      `Largest Request:     ${formatNumber(tokens.max)}`,
    ], width),
    ...box("YOUR INVESTMENT", [
      `Total Cost:          ${formatCost(totals.cost)}`,
      `Average per Day:     ${formatCost(daily.cost)}`,
    ], width),
    ...box("TOP 5 MODELS", models, width),
    ...box("PEAK TIMES", [
      `Peak Hour:           ${formatHour(peaks.hour.key)} (${formatInteger(peaks.hour.events)} requests)`,
      `Peak Day:            ${formatLongDate(peaks.date.key)} (${formatInteger(peaks.date.events)} requests)`,
      `Peak Weekday:        ${weekdayName(peaks.weekday.key)} (${formatInteger(peaks.weekday.events)} requests)`,
      `Peak Month:          ${formatMonth(peaks.month.key)} (${formatInteger(peaks.month.events)} requests)`,
      `Peak Day of Month:   ${ordinal(peaks.dayOfMonth.key)} (${formatInteger(peaks.dayOfMonth.events)} requests)`,
    ], width),
    ...box("CACHE EFFICIENCY", [
      `Cache Hit Rate:      ${formatPercent(cache.hitRate)}`,
      `Tokens from Cache:   ${formatNumber(cache.tokensSaved)}`,
      `Read Efficiency:     ${formatPercent(cache.efficiency)}`,
    ], width),
    rule,
    center("Thanks for building!", width),
    rule,
    "",
  ];
}

/** Boxed terminal display, the layout used when reloading a saved summary. */
export class TerminalPresenter implements Presenter {
  readonly name = "terminal" as const;

  constructor(
    private readonly out: Writable,
    private readonly width = DEFAULT_BOX_WIDTH,
  ) {}

  async render(summary: UsageSummary): Promise<void> {
    this.out.write(renderTerminalReport(summary, this.width).join("\n") + "\n");
  }
}

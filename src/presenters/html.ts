import { writeArtifact } from "../summary/store.js";
import type { BucketCount, UsageSummary } from "../summary/types.js";
import {
  formatCost,
  formatHour,
  formatInteger,
  formatLongDate,
  formatMonth,
  formatNumber,
  formatPercent,
  prettyModelName,
  weekdayName,
} from "./format.js";
import type { Presenter } from "./types.js";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function stat(label: string, value: string): string {
  return `<div class="stat"><span class="value">${escapeHtml(value)}</span><span class="label">${escapeHtml(label)}</span></div>`;
}

function barChart(
  title: string,
  buckets: readonly BucketCount<number>[],
  label: (key: number) => string,
): string {
  const peak = Math.max(1, ...buckets.map((b) => b.events));
  const bars = buckets
    .map((b) => {
      const pct = Math.round((b.events / peak) * 100);
      return `<div class="bar" title="${escapeHtml(`${label(b.key)}: ${b.events} requests`)}"><div class="fill" style="height:${pct}%"></div><small>${escapeHtml(label(b.key))}</small></div>`;
    })
    .join("");
  return `<section class="card"><h3>${escapeHtml(title)}</h3><div class="chart">${bars}</div></section>`;
}

export function renderWrappedHtml(summary: UsageSummary): string {
  const { totals, span, daily, peaks, cache, tokens } = summary;

  const modelRows = summary.models
    .map(
      (m, i) =>
        `<tr><td>${i + 1}</td><td>${escapeHtml(prettyModelName(m.model))}</td><td>${formatInteger(m.events)}</td><td>${formatNumber(m.tokens)}</td><td>${formatPercent(m.tokenShare)}</td><td>${formatCost(m.cost)}</td></tr>`,
    )
    .join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Usage Wrapped ${summary.year}</title>
<style>
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body { font-family: system-ui, -apple-system, sans-serif; background: #0d1117; color: #c9d1d9; padding: 32px; }
  header { text-align: center; margin-bottom: 32px; }
  header h1 { color: #58a6ff; font-size: 40px; }
  header p { color: #8b949e; margin-top: 8px; }
  .grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(180px, 1fr)); gap: 16px; margin-bottom: 24px; }
  .stat, .card { background: #161b22; border: 1px solid #30363d; border-radius: 12px; padding: 16px; }
  .stat .value { display: block; font-size: 28px; color: #3fb950; }
  .stat .label { color: #8b949e; font-size: 13px; }
  .card { margin-bottom: 24px; }
  .card h3 { color: #58a6ff; margin-bottom: 12px; font-size: 14px; }
  table { width: 100%; border-collapse: collapse; }
  th, td { padding: 8px 12px; text-align: left; border-bottom: 1px solid #30363d; }
  th { color: #58a6ff; }
  .chart { display: flex; align-items: flex-end; gap: 4px; height: 160px; }
  .bar { flex: 1; display: flex; flex-direction: column; justify-content: flex-end; align-items: center; height: 100%; }
  .bar .fill { width: 100%; background: #238636; border-radius: 4px 4px 0 0; }
  .bar small { color: #8b949e; font-size: 10px; margin-top: 4px; }
  footer { text-align: center; color: #8b949e; margin-top: 32px; font-size: 12px; }
</style>
</head>
<body>
<header>
  <h1>Usage Wrapped ${summary.year}</h1>
  <p>${escapeHtml(formatLongDate(span.first))} &rarr; ${escapeHtml(formatLongDate(span.last))}</p>
</header>
<div class="grid">
  ${stat("requests", formatInteger(totals.events))}
  ${stat("tokens processed", formatNumber(totals.tokens))}
  ${stat("days active", String(span.daysActive))}
  ${stat("tokens per day", formatNumber(daily.tokens))}
  ${stat("total cost", formatCost(totals.cost))}
  ${stat("cache hit rate", formatPercent(cache.hitRate))}
</div>
<div class="grid">
  ${stat("peak hour", formatHour(peaks.hour.key))}
  ${stat("busiest weekday", weekdayName(peaks.weekday.key))}
  ${stat("peak day", formatLongDate(peaks.date.key))}
  ${stat("peak month", formatMonth(peaks.month.key))}
  ${stat("tokens from cache", formatNumber(cache.tokensSaved))}
</div>
<section class="card">
  <h3>Models</h3>
  <table>
    <thead><tr><th>#</th><th>Model</th><th>Requests</th><th>Tokens</th><th>Share</th><th>Cost</th></tr></thead>
    <tbody>
${modelRows}
    </tbody>
  </table>
</section>
${barChart("Requests by hour", summary.buckets.hour, (h) => String(h))}
${barChart("Requests by weekday", summary.buckets.weekday, (d) => weekdayName(d).slice(0, 3))}
<section class="card">
  <h3>Token statistics</h3>
  <div class="grid">
    ${stat("average per request", formatNumber(tokens.mean))}
    ${stat("median per request", formatNumber(tokens.median))}
    ${stat("largest request", formatNumber(tokens.max))}
  </div>
</section>
<footer>${summary.generatedAt ? `Generated ${escapeHtml(summary.generatedAt)}` : ""}</footer>
</body>
</html>
`;
}

/** Writes the summary as a self-contained static page. */
export class HtmlPresenter implements Presenter {
  readonly name = "html" as const;

  constructor(private readonly outputPath: string) {}

  async render(summary: UsageSummary): Promise<void> {
    await writeArtifact(this.outputPath, renderWrappedHtml(summary));
  }
}

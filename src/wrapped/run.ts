import type { Writable } from "node:stream";
import { aggregateRows } from "../aggregate/engine.js";
import type { WrappedConfig } from "../config/types.js";
import { CsvEventSource, type EventSource } from "../events/source.js";
import type { Logger } from "../logging/logger.js";
import { createRegistry } from "../presenters/registry.js";
import { writeSummary } from "../summary/store.js";
import type { UsageSummary } from "../summary/types.js";

export interface RunWrappedOpts {
  readonly config: WrappedConfig;
  readonly logger: Logger;
  readonly stdout: Writable;
  readonly source?: EventSource;
  readonly now?: () => Date;
}

export interface RunFailure {
  readonly step: string;
  readonly error: Error;
}

export interface RunWrappedResult {
  readonly summary: UsageSummary;
  readonly summaryPath: string | null;
  readonly failures: RunFailure[];
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Source -> engine -> persisted summary -> presenters.
 *
 * Source and empty-input errors propagate and nothing is written. Once a
 * summary exists, a failing write or presenter is recorded in `failures`
 * and the remaining presenters still run.
 */
export async function runWrapped(opts: RunWrappedOpts): Promise<RunWrappedResult> {
  const { config, stdout } = opts;
  const log = opts.logger.child({ component: "wrapped" });
  const now = opts.now ?? (() => new Date());

  const source =
    opts.source ??
    new CsvEventSource({ path: config.input.path, delimiter: config.input.delimiter });
  const rows = await source.readRows();
  log.info({ source: source.location, rows: rows.length }, "Loaded usage rows");

  const summary = aggregateRows(rows, {
    columns: config.input.columns,
    filters: { kinds: config.input.kinds, dropZeroTokens: config.input.dropZeroTokens },
    generatedAt: now().toISOString(),
    onMalformed: (error) => log.warn({ row: error.row, field: error.field }, error.message),
  });

  if (summary.source.skipped > 0) {
    log.warn({ skipped: summary.source.skipped }, "Skipped malformed rows");
  }
  log.info(
    {
      events: summary.totals.events,
      tokens: summary.totals.tokens,
      models: summary.models.length,
      filtered: summary.source.filtered,
    },
    "Summary computed",
  );

  const failures: RunFailure[] = [];
  let summaryPath: string | null = null;
  try {
    summaryPath = await writeSummary(config.output.summaryPath, summary);
    log.info({ path: summaryPath }, "Summary saved");
  } catch (error) {
    failures.push({ step: "persist", error: toError(error) });
    log.error({ err: error }, "Failed to save summary");
  }

  const registry = createRegistry(config.presenters, {
    stdout,
    htmlPath: config.output.htmlPath,
  });
  for (const presenter of registry.list()) {
    try {
      await presenter.render(summary);
      log.debug({ presenter: presenter.name }, "Presenter finished");
    } catch (error) {
      failures.push({ step: `present:${presenter.name}`, error: toError(error) });
      log.error({ err: error, presenter: presenter.name }, "Presenter failed");
    }
  }

  return { summary, summaryPath, failures };
}

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { SourceUnavailableError, errnoCode, errorMessage } from "../utils/errors.js";
import type { SourceRow } from "./types.js";

const rowsSchema = z.array(z.record(z.string(), z.string()));

/** Anything that can hand the engine a list of decoded rows. */
export interface EventSource {
  readonly location: string;
  readRows(): Promise<SourceRow[]>;
}

export interface CsvEventSourceOpts {
  readonly path: string;
  readonly delimiter?: string;
}

/** Reads a usage export with a header row; every later row becomes a SourceRow. */
export class CsvEventSource implements EventSource {
  readonly location: string;
  private readonly delimiter: string;

  constructor(opts: CsvEventSourceOpts) {
    this.location = resolve(opts.path);
    this.delimiter = opts.delimiter ?? ",";
  }

  async readRows(): Promise<SourceRow[]> {
    let content: string;
    try {
      content = await readFile(this.location, "utf-8");
    } catch (error) {
      const code = errnoCode(error);
      const reason =
        code === "ENOENT" ? "file not found"
          : code === "EACCES" ? "permission denied"
            : code === "EISDIR" ? "path is a directory"
              : errorMessage(error);
      throw new SourceUnavailableError(this.location, reason, error);
    }

    return parseCsvRows(content, this.location, this.delimiter);
  }
}

export function parseCsvRows(content: string, location: string, delimiter = ","): SourceRow[] {
  let records: unknown;
  try {
    records = parse(content, {
      columns: true,
      bom: true,
      delimiter,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch (error) {
    throw new SourceUnavailableError(location, `invalid CSV (${errorMessage(error)})`, error);
  }

  const parsed = rowsSchema.safeParse(records);
  if (!parsed.success) {
    throw new SourceUnavailableError(location, "CSV rows could not be decoded", parsed.error);
  }

  return parsed.data.map((fields, index) => ({ row: index + 1, fields }));
}

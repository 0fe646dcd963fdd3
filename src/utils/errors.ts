/**
 * Base class for every error the wrapped pipeline raises on purpose.
 * Carries a machine-readable code and structured context for the logger.
 */
export class WrappedError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(params: {
    message: string;
    code: string;
    cause?: unknown;
    context?: Record<string, unknown>;
  }) {
    super(params.message, { cause: params.cause });
    this.name = "WrappedError";
    this.code = params.code;
    this.context = params.context;
  }
}

/** The input cannot be read at all (missing file, permissions, undecodable CSV). */
export class SourceUnavailableError extends WrappedError {
  constructor(path: string, reason: string, cause?: unknown) {
    super({
      message: `Cannot read usage data from ${path}: ${reason}`,
      code: "SOURCE_UNAVAILABLE",
      cause,
      context: { path, reason },
    });
    this.name = "SourceUnavailableError";
  }
}

/** One row failed validation. Recovered locally: the row is skipped and counted. */
export class MalformedRecordError extends WrappedError {
  public readonly row: number;
  public readonly field: string;

  constructor(row: number, field: string, reason: string) {
    super({
      message: `Row ${row}: ${field} ${reason}`,
      code: "MALFORMED_RECORD",
      context: { row, field, reason },
    });
    this.name = "MalformedRecordError";
    this.row = row;
    this.field = field;
  }
}

/** No valid events remain, so no statistic can be computed. */
export class EmptyInputError extends WrappedError {
  constructor(skipped = 0, filtered = 0) {
    super({
      message:
        `No valid usage events to summarize` +
        (skipped + filtered > 0 ? ` (${skipped} malformed, ${filtered} filtered out)` : ""),
      code: "EMPTY_INPUT",
      context: { skipped, filtered },
    });
    this.name = "EmptyInputError";
  }
}

/** An output artifact could not be written. The in-memory summary is still valid. */
export class SerializationError extends WrappedError {
  constructor(path: string, cause?: unknown) {
    super({
      message: `Failed to write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      code: "SERIALIZATION_FAILED",
      cause,
      context: { path },
    });
    this.name = "SerializationError";
  }
}

/** A summary document does not match the summary schema. */
export class InvalidSummaryError extends WrappedError {
  public readonly issues: string[];

  constructor(issues: string[], cause?: unknown) {
    super({
      message: `Invalid summary: ${issues.join("; ")}`,
      code: "INVALID_SUMMARY",
      cause,
      context: { issues },
    });
    this.name = "InvalidSummaryError";
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The errno code of a failed fs call, if there is one. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

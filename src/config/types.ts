import type { ColumnMap } from "../events/types.js";

export type PresenterName = "console" | "terminal" | "html";

export interface WrappedConfig {
  readonly input: InputConfig;
  readonly output: OutputConfig;
  readonly presenters: PresenterName[];
  readonly logging: LoggingConfig;
}

export interface InputConfig {
  readonly path: string;
  readonly delimiter: string;
  readonly columns: ColumnMap;
  readonly kinds?: string[];
  readonly dropZeroTokens: boolean;
}

export interface OutputConfig {
  readonly summaryPath: string;
  readonly htmlPath?: string;
}

export interface LoggingConfig {
  readonly level?: "debug" | "info" | "warn" | "error" | "silent";
  readonly file?: string;
  readonly json?: boolean;
}

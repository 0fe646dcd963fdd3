import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { logLevelSchema } from "../../config/schema.js";
import type { PresenterName, WrappedConfig } from "../../config/types.js";
import { createLogger } from "../../logging/logger.js";
import { WrappedError, errorMessage } from "../../utils/errors.js";
import { runWrapped } from "../../wrapped/run.js";
import { printBanner } from "../banner.js";
import { parsePresenterList, splitList } from "../options.js";
import { VERSION } from "../version.js";

export class AnalyzeCommand extends Command {
  static override paths = [["analyze"], Command.Default];

  static override usage = Command.Usage({
    description: "Summarize a usage export into a year-in-review report",
    details: `
      Reads the CSV export, writes the JSON summary and renders it with the
      configured presenters. Exits with 1 when the input cannot be read, when
      no valid events remain, or when an output cannot be written.
    `,
    examples: [
      ["Summarize the configured export", "wrapped analyze"],
      ["Summarize a specific file", "wrapped analyze ./usage-events-2025.csv"],
      ["Also write a static page", "wrapped analyze ./usage.csv --html ./wrapped.html"],
      ["Only count included requests", "wrapped analyze ./usage.csv --kinds Included --drop-zero-tokens"],
    ],
  });

  input = Option.String({ name: "input", required: false });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  output = Option.String("--output,-o", {
    description: "Where to write the JSON summary",
    required: false,
  });

  html = Option.String("--html", {
    description: "Write a static HTML page to this path",
    required: false,
  });

  present = Option.String("--present,-p", {
    description: "Comma separated presenters: console, terminal, html",
    required: false,
  });

  kinds = Option.String("--kinds", {
    description: "Comma separated event kinds to keep",
    required: false,
  });

  dropZeroTokens = Option.Boolean("--drop-zero-tokens", false, {
    description: "Leave out events that used no tokens",
  });

  logLevel = Option.String("--log-level", {
    description: "debug, info, warn, error or silent",
    required: false,
  });

  quiet = Option.Boolean("--quiet,-q", false, {
    description: "Do not print the banner",
  });

  private resolveConfig(base: WrappedConfig): WrappedConfig {
    let presenters: PresenterName[] = this.present ? parsePresenterList(this.present) : base.presenters;
    if (this.html && !presenters.includes("html")) {
      presenters = [...presenters, "html"];
    }

    let level = base.logging.level;
    if (this.logLevel !== undefined) {
      const parsed = logLevelSchema.safeParse(this.logLevel);
      if (!parsed.success) throw new Error(`Unknown log level: ${this.logLevel}`);
      level = parsed.data;
    }

    return {
      input: {
        ...base.input,
        path: this.input ?? base.input.path,
        kinds: this.kinds ? splitList(this.kinds) : base.input.kinds,
        dropZeroTokens: this.dropZeroTokens || base.input.dropZeroTokens,
      },
      output: {
        summaryPath: this.output ?? base.output.summaryPath,
        htmlPath: this.html ?? base.output.htmlPath,
      },
      presenters,
      logging: { ...base.logging, level },
    };
  }

  async execute(): Promise<number> {
    let config: WrappedConfig;
    try {
      config = this.resolveConfig(loadConfig(this.config));
    } catch (err) {
      this.context.stderr.write(`Configuration error: ${errorMessage(err)}\n`);
      return 1;
    }

    if (!this.quiet) printBanner(this.context.stderr, VERSION);

    const logger = createLogger(config.logging);

    try {
      const result = await runWrapped({ config, logger, stdout: this.context.stdout });
      for (const failure of result.failures) {
        this.context.stderr.write(`Error (${failure.step}): ${failure.error.message}\n`);
      }
      return result.failures.length > 0 ? 1 : 0;
    } catch (err) {
      if (err instanceof WrappedError) {
        logger.error({ code: err.code, ...err.context }, err.message);
      } else {
        logger.error({ err }, "Unexpected failure");
      }
      this.context.stderr.write(`Error: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}

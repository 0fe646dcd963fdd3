import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { createRegistry } from "../../presenters/registry.js";
import { readSummary } from "../../summary/store.js";
import { errorMessage } from "../../utils/errors.js";
import { parsePresenterList } from "../options.js";

export class ShowCommand extends Command {
  static override paths = [["show"]];

  static override usage = Command.Usage({
    description: "Render a previously saved summary",
    examples: [
      ["Show the last summary as a boxed report", "wrapped show"],
      ["Show a specific summary file", "wrapped show ./wrapped-summary.json"],
      ["Render it as a static page", "wrapped show --present html --html ./wrapped.html"],
    ],
  });

  summaryFile = Option.String({ name: "summary", required: false });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  present = Option.String("--present,-p", "terminal", {
    description: "Comma separated presenters: console, terminal, html",
  });

  html = Option.String("--html", {
    description: "Path for the html presenter",
    required: false,
  });

  async execute(): Promise<number> {
    let summaryPath: string;
    let htmlPath: string | undefined;
    try {
      const config = loadConfig(this.config);
      summaryPath = this.summaryFile ?? config.output.summaryPath;
      htmlPath = this.html ?? config.output.htmlPath;
    } catch (err) {
      this.context.stderr.write(`Configuration error: ${errorMessage(err)}\n`);
      return 1;
    }

    try {
      const summary = await readSummary(summaryPath);
      const registry = createRegistry(parsePresenterList(this.present), {
        stdout: this.context.stdout,
        htmlPath,
      });
      for (const presenter of registry.list()) {
        await presenter.render(summary);
      }
      return 0;
    } catch (err) {
      this.context.stderr.write(`Error: ${errorMessage(err)}\n`);
      this.context.stderr.write(`Run: wrapped analyze <usage.csv>\n`);
      return 1;
    }
  }
}

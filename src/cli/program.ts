import { Cli } from "clipanion";
import { AnalyzeCommand } from "./commands/analyze.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { ShowCommand } from "./commands/show.js";
import { VERSION } from "./version.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Usage Wrapped",
    binaryName: "wrapped",
    binaryVersion: VERSION,
  });

  cli.register(AnalyzeCommand);
  cli.register(ShowCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}

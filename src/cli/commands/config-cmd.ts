import { existsSync } from "node:fs";
import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { errorMessage } from "../../utils/errors.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration, defaults included",
    examples: [["Show config", "wrapped config show"]],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    try {
      const config = loadConfig(this.config);
      this.context.stdout.write(JSON.stringify(config, null, 2) + "\n");
      return 0;
    } catch (err) {
      this.context.stderr.write(`Failed to load config: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "wrapped config validate"],
      ["Validate specific file", "wrapped config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? getConfigPath();
    // A missing file is an error here, not a set of defaults.
    if (!existsSync(configPath)) {
      this.context.stdout.write(`Config file not found: ${configPath}\n`);
      return 1;
    }

    try {
      loadConfig(configPath);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(`Config is INVALID: ${configPath}\n  ${errorMessage(err)}\n`);
      return 1;
    }
  }
}

import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

const STDERR = 2;

/**
 * Logs go to stderr (or a file) so stdout only carries presenter output.
 */
export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const options: pino.LoggerOptions = { level };

  if (config?.file) {
    return pino(options, pino.destination({ dest: config.file, sync: true }));
  }

  if (isJson) {
    return pino(options, pino.destination({ dest: STDERR, sync: true }));
  }

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", destination: STDERR },
    },
  });
}

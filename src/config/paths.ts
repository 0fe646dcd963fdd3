export function getConfigPath(): string {
  return process.env["WRAPPED_CONFIG_PATH"] ?? "wrapped.config.json";
}

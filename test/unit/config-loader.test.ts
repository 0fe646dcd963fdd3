import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, substituteEnv } from "../../src/config/loader.js";
import { getConfigPath } from "../../src/config/paths.js";
import { parseConfig } from "../../src/config/schema.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_USAGE_DIR"] = "/data/exports";
    process.env["TEST_DELIM"] = ";";
  });

  afterEach(() => {
    delete process.env["TEST_USAGE_DIR"];
    delete process.env["TEST_DELIM"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("path: ${env:TEST_USAGE_DIR}/usage.csv")).toBe(
      "path: /data/exports/usage.csv",
    );
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_USAGE_DIR}${env:TEST_DELIM}")).toBe("/data/exports;");
  });

  it("throws for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow(
      "Missing environment variable: MISSING_VAR",
    );
  });

  it("leaves text without env vars unchanged", () => {
    expect(substituteEnv("no substitution here")).toBe("no substitution here");
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("fills every default from an empty object", () => {
    const config = parseConfig({});
    expect(config.input.path).toBe("usage-events.csv");
    expect(config.input.delimiter).toBe(",");
    expect(config.input.columns.timestamp).toBe("Date");
    expect(config.input.columns.outputTokens).toBe("Output Tokens");
    expect(config.input.kinds).toBeUndefined();
    expect(config.input.dropZeroTokens).toBe(false);
    expect(config.output.summaryPath).toBe("wrapped-summary.json");
    expect(config.output.htmlPath).toBeUndefined();
    expect(config.presenters).toEqual(["console"]);
    expect(config.logging.level).toBe("info");
  });

  it("keeps overrides and defaults the rest of a column map", () => {
    const config = parseConfig({
      input: { columns: { timestamp: "When", cost: "USD" }, kinds: ["Included"] },
      presenters: ["terminal", "html"],
    });
    expect(config.input.columns.timestamp).toBe("When");
    expect(config.input.columns.cost).toBe("USD");
    expect(config.input.columns.model).toBe("Model");
    expect(config.input.kinds).toEqual(["Included"]);
    expect(config.presenters).toEqual(["terminal", "html"]);
  });

  it("rejects an unknown presenter", () => {
    expect(() => parseConfig({ presenters: ["slides"] })).toThrow();
  });

  it("rejects a multi-character delimiter", () => {
    expect(() => parseConfig({ input: { delimiter: ";;" } })).toThrow();
  });

  it("rejects an unknown log level", () => {
    expect(() => parseConfig({ logging: { level: "verbose" } })).toThrow();
  });
});

describe("getConfigPath", () => {
  afterEach(() => {
    delete process.env["WRAPPED_CONFIG_PATH"];
  });

  it("defaults to wrapped.config.json", () => {
    delete process.env["WRAPPED_CONFIG_PATH"];
    expect(getConfigPath()).toBe("wrapped.config.json");
  });

  it("honours WRAPPED_CONFIG_PATH", () => {
    process.env["WRAPPED_CONFIG_PATH"] = "/etc/wrapped.json";
    expect(getConfigPath()).toBe("/etc/wrapped.json");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "wrapped-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    delete process.env["TEST_USAGE_FILE"];
  });

  it("returns defaults when the file does not exist", () => {
    const config = loadConfig(join(dir, "absent.json"));
    expect(config).toEqual(parseConfig({}));
  });

  it("reads a file and substitutes env references", () => {
    process.env["TEST_USAGE_FILE"] = "/data/march.csv";
    const path = join(dir, "wrapped.config.json");
    writeFileSync(
      path,
      JSON.stringify({ input: { path: "${env:TEST_USAGE_FILE}" }, presenters: ["terminal"] }),
    );

    const config = loadConfig(path);
    expect(config.input.path).toBe("/data/march.csv");
    expect(config.presenters).toEqual(["terminal"]);
  });

  it("throws on malformed JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path)).toThrow(SyntaxError);
  });
});

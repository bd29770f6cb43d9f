import { describe, it, expect, afterEach, beforeEach } from "vitest";
import path from "path";
import fs from "fs";
import os from "os";
import { LogLevel, UnknownEnumerationValueError } from "../src";
import { applyEnvOverrides, loadConfig, validateConfig } from "../src/config/loader";
import type { ParserConfig } from "../src/config/types";

const schemaPath = path.resolve(__dirname, "../../../config/schema/parser-config.schema.json");

const baseConfig: ParserConfig = {
  room: "fulltilt",
  logging: { level: LogLevel.INFO, console: true },
  batch: { failFast: false }
};

describe("config loader", () => {
  it("loads and validates the default config", () => {
    const cfg = loadConfig();
    expect(cfg.room).toBe("fulltilt");
    expect(cfg.logging).toEqual({ level: "info", console: true });
    expect(cfg.batch.failFast).toBe(false);
  });

  describe("with a temp directory", () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "hh-config-test-"));
    });

    afterEach(async () => {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
    });

    it("loads a config with a file sink", async () => {
      const cfgPath = path.join(tempDir, "parser.json");
      const config = {
        ...baseConfig,
        logging: { level: "debug", console: false, file: { outputDir: "logs", maxFiles: 3 } }
      };
      await fs.promises.writeFile(cfgPath, JSON.stringify(config), "utf-8");
      expect(loadConfig(cfgPath, schemaPath).logging.file).toEqual({ outputDir: "logs", maxFiles: 3 });
    });

    it("throws on an invalid config file", async () => {
      const cfgPath = path.join(tempDir, "invalid.json");
      await fs.promises.writeFile(cfgPath, JSON.stringify({ room: "fulltilt" }), "utf-8");
      expect(() => loadConfig(cfgPath, schemaPath)).toThrow("Config validation failed");
    });
  });

  it("validateConfig accepts a valid config", () => {
    const result = validateConfig(baseConfig, schemaPath);
    expect(result.valid).toBe(true);
    expect(result.errors).toBeUndefined();
  });

  it("validateConfig reports every problem", () => {
    const result = validateConfig(
      { room: "", logging: { level: "verbose", console: true }, batch: { failFast: false } },
      schemaPath
    );
    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(2);
  });

  it("validateConfig rejects unknown keys", () => {
    const result = validateConfig({ ...baseConfig, vision: {} }, schemaPath);
    expect(result.valid).toBe(false);
  });
});

describe("applyEnvOverrides", () => {
  it("lets HH_ROOM and HH_LOG_LEVEL win over the file", () => {
    const config = applyEnvOverrides(baseConfig, { HH_ROOM: "otherroom", HH_LOG_LEVEL: "DEBUG" });
    expect(config.room).toBe("otherroom");
    expect(config.logging.level).toBe(LogLevel.DEBUG);
    expect(baseConfig.logging.level).toBe(LogLevel.INFO);
  });

  it("ignores empty values", () => {
    expect(applyEnvOverrides(baseConfig, { HH_ROOM: " ", HH_LOG_LEVEL: "" })).toEqual(baseConfig);
  });

  it("rejects unknown log levels", () => {
    expect(() => applyEnvOverrides(baseConfig, { HH_LOG_LEVEL: "loud" })).toThrowError(UnknownEnumerationValueError);
  });
});

import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { SchemaObject } from "ajv";
import { parseLogLevel } from "../observability";
import type { ParserConfig, ValidationResult } from "./types";

export const defaultSchemaPath = path.resolve(__dirname, "../../../../config/schema/parser-config.schema.json");
export const defaultConfigPath = path.resolve(__dirname, "../../../../config/parser.config.json");

type EnvSource = Record<string, string | undefined>;

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function compileSchema(schemaFilePath: string) {
  const schemaRaw = fs.readFileSync(schemaFilePath, "utf-8");
  const schema: unknown = JSON.parse(schemaRaw);
  if (!isSchemaObject(schema)) {
    throw new Error(`Schema at ${schemaFilePath} is not a JSON object`);
  }
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  return { ajv, validateFn: ajv.compile<ParserConfig>(schema) };
}

/**
 * Validates config and returns structured result without throwing.
 */
export function validateConfig(config: unknown, schemaFilePath: string = defaultSchemaPath): ValidationResult {
  const { validateFn } = compileSchema(schemaFilePath);
  const valid = validateFn(config);
  if (!valid) {
    const errors = validateFn.errors?.map(err => `${err.instancePath} ${err.message}`) || [];
    return { valid: false, errors };
  }
  return { valid: true };
}

export function validate(config: unknown, schemaFilePath: string = defaultSchemaPath): asserts config is ParserConfig {
  const { ajv, validateFn } = compileSchema(schemaFilePath);
  if (!validateFn(config)) {
    const msg = ajv.errorsText(validateFn.errors, { separator: "\n" });
    throw new Error(`Config validation failed:\n${msg}`);
  }
}

export function loadConfig(filePath: string = defaultConfigPath, schemaFilePath: string = defaultSchemaPath): ParserConfig {
  const raw = fs.readFileSync(filePath, "utf-8");
  const cfg: unknown = JSON.parse(raw);
  validate(cfg, schemaFilePath);
  return cfg;
}

/** HH_ROOM and HH_LOG_LEVEL take precedence over the file. */
export function applyEnvOverrides(config: ParserConfig, source: EnvSource = process.env): ParserConfig {
  const room = source.HH_ROOM?.trim();
  const level = source.HH_LOG_LEVEL?.trim();
  return {
    ...config,
    room: room ? room : config.room,
    logging: {
      ...config.logging,
      level: level ? parseLogLevel(level) : config.logging.level
    }
  };
}

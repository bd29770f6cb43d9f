import { existsSync, readFileSync } from "node:fs";
import { parse } from "dotenv";
import type { EnvService } from "./schema";
import { ENV_SCHEMAS } from "./schema";

export type EnvSource = Record<string, string | undefined>;

const PLACEHOLDER_PATTERNS = [/CHANGE_ME/i, /REPLACE_ME/i, /^<.*>$/];

export class EnvValidationError extends Error {
  constructor(service: EnvService, public readonly missing: string[]) {
    super(
      `[env] Missing required environment variables for ${service}: ${[...missing]
        .sort()
        .join(", ")}`
    );
    this.name = "EnvValidationError";
  }
}

export function getMissingEnvVars(service: EnvService, source: EnvSource = process.env): string[] {
  const schema = ENV_SCHEMAS[service];

  return schema.required.filter(key => {
    const value = source[key];
    if (value === undefined) {
      return true;
    }

    if (schema.allowEmpty?.includes(key)) {
      return false;
    }

    const trimmed = value.trim();
    if (!trimmed.length) {
      return true;
    }

    return PLACEHOLDER_PATTERNS.some(pattern => pattern.test(trimmed));
  });
}

export function assertEnvVars(service: EnvService, source: EnvSource = process.env): void {
  const missing = getMissingEnvVars(service, source);
  if (missing.length) {
    throw new EnvValidationError(service, missing);
  }
}

/**
 * Layers a dotenv file under the given source: values already present in
 * `source` win. A missing file leaves the source as is.
 */
export function loadEnvFile(filePath: string, source: EnvSource = process.env): EnvSource {
  if (!existsSync(filePath)) {
    return { ...source };
  }
  const fromFile = parse(readFileSync(filePath, "utf8"));
  return { ...fromFile, ...definedOnly(source) };
}

function definedOnly(source: EnvSource): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

import type { LogLevel } from "../observability";

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export interface FileLoggingConfig {
  outputDir: string;
  maxFileSizeMb?: number;
  maxFiles?: number;
}

export interface LoggingConfig {
  level: LogLevel;
  console: boolean;
  file?: FileLoggingConfig;
}

export interface ParserConfig {
  /** Registered room adapter name, e.g. "fulltilt". */
  room: string;
  logging: LoggingConfig;
  batch: {
    /** Stop at the first hand that fails instead of collecting failures. */
    failFast: boolean;
  };
}

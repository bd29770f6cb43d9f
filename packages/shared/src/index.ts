export * from "./cards";
export * from "./constants";
export * from "./errors";
export * from "./observability";
export * from "./rng";
export * from "./time";
export * from "./env/validator";
export * from "./env/schema";
export * as config from "./config";
export { loadConfig, validateConfig, applyEnvOverrides } from "./config/loader";
export type { ParserConfig, LoggingConfig, FileLoggingConfig, ValidationResult } from "./config/types";

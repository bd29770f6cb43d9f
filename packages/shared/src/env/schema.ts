export type EnvSchema = {
  required: string[];
  optional?: string[];
  allowEmpty?: string[];
};

export type EnvService = "root" | "cli" | "logger";

export const ENV_SCHEMAS: Record<EnvService, EnvSchema> = {
  root: {
    required: ["HH_CONFIG"],
    optional: ["HH_ROOM", "HH_LOG_LEVEL"]
  },
  cli: {
    required: ["HH_CONFIG"],
    optional: ["HH_ROOM", "HH_LOG_LEVEL", "HH_SESSION_ID"],
    allowEmpty: ["HH_ROOM", "HH_SESSION_ID"]
  },
  logger: {
    required: ["HH_LOG_DIR", "HH_LOG_MAX_FILES"],
    optional: ["HH_LOG_MAX_FILE_SIZE_MB"]
  }
};

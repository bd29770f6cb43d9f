import { writeFile } from "node:fs/promises";
import path from "node:path";
import {
  applyEnvOverrides,
  loadConfig,
  type EnvSource,
  type ParserConfig
} from "@hh-parser/shared";
import { createLogger, type StructuredLogger } from "@hh-parser/logger";
import { parseHandFiles } from "../batch";
import { getRoom, listRooms } from "../rooms/registry";
import type { RoomAdapter } from "../rooms/types";
import { serializeHand } from "../serialize";

export interface CliContext {
  config: ParserConfig;
  adapter: RoomAdapter;
  logger: StructuredLogger;
}

export interface CliOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

function optionalNumber(value: string | undefined): number | undefined {
  if (!value?.trim()) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Config file from HH_CONFIG (relative to cwd) or the bundled default, with
 * env overrides applied. HH_LOG_DIR adds a file sink when the file has none.
 */
export function resolveCliConfig(env: EnvSource, cwd: string = process.cwd()): ParserConfig {
  const configPath = env.HH_CONFIG?.trim();
  const fileConfig = configPath ? loadConfig(path.resolve(cwd, configPath)) : loadConfig();
  const config = applyEnvOverrides(fileConfig, env);
  const logDir = env.HH_LOG_DIR?.trim();
  if (!logDir || config.logging.file) {
    return config;
  }
  return {
    ...config,
    logging: {
      ...config.logging,
      file: {
        outputDir: path.resolve(cwd, logDir),
        maxFiles: optionalNumber(env.HH_LOG_MAX_FILES),
        maxFileSizeMb: optionalNumber(env.HH_LOG_MAX_FILE_SIZE_MB)
      }
    }
  };
}

export async function createCliContext(env: EnvSource, roomOverride?: string): Promise<CliContext> {
  const config = resolveCliConfig(env);
  const adapter = getRoom(roomOverride ?? config.room);
  const logger = createLogger(config.logging, {
    sessionId: env.HH_SESSION_ID?.trim() || `hh-parse-${Date.now()}`,
    component: "hh-parse",
    consoleFormat: "line",
    // stdout carries the JSON output
    consoleImpl: new console.Console({ stdout: process.stderr, stderr: process.stderr })
  });
  await logger.start();
  return { config, adapter, logger };
}

export interface ParseCommandOptions {
  files: readonly string[];
  output?: string;
  headerOnly?: boolean;
}

/** Parses `files`, emitting one JSON line per hand. Resolves to the exit code. */
export async function runParseCommand(
  context: CliContext,
  options: ParseCommandOptions,
  io: CliOutput
): Promise<number> {
  const { hands, failures } = await parseHandFiles(options.files, context.adapter, {
    logger: context.logger.child("batch"),
    failFast: context.config.batch.failFast,
    headerOnly: options.headerOnly
  });
  const lines = hands.map(hand => JSON.stringify(serializeHand(hand)));
  if (options.output) {
    await writeFile(options.output, lines.map(line => `${line}\n`).join(""), "utf-8");
  } else {
    lines.forEach(line => io.out(line));
  }
  failures.forEach(failure => io.err(`${failure.source}: ${failure.error.message}`));
  return failures.length > 0 ? 1 : 0;
}

export function runRoomsCommand(io: CliOutput): number {
  listRooms().forEach(name => io.out(name));
  return 0;
}

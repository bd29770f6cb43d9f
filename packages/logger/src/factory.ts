import type { LoggingConfig } from "@hh-parser/shared";
import { StructuredLogger } from "./structuredLogger";
import { createConsoleSink, type ConsoleFormat } from "./sinks/consoleSink";
import { createFileSink } from "./sinks/fileSink";
import type { LogSink } from "./sinks/types";

export interface LoggerFactoryOptions {
  sessionId: string;
  component: string;
  consoleFormat?: ConsoleFormat;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

/** Builds a logger with the sinks `config` enables. Call `start()` before use. */
export function createLogger(config: LoggingConfig, options: LoggerFactoryOptions): StructuredLogger {
  const sinks: LogSink[] = [];
  if (config.console) {
    sinks.push(
      createConsoleSink({
        level: config.level,
        format: options.consoleFormat,
        consoleImpl: options.consoleImpl
      })
    );
  }
  if (config.file) {
    sinks.push(
      createFileSink({
        sessionId: options.sessionId,
        level: config.level,
        outputDir: config.file.outputDir,
        maxFileSizeMb: config.file.maxFileSizeMb,
        maxFiles: config.file.maxFiles,
        logger: options.consoleImpl
      })
    );
  }
  return new StructuredLogger({
    sessionId: options.sessionId,
    component: options.component,
    level: config.level,
    sinks
  });
}

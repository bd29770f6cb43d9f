import { LogLevel, shouldLog, type StructuredLogEvent } from "@hh-parser/shared";
import type { LogSink } from "./types";

export type ConsoleFormat = "json" | "line";

interface ConsoleSinkOptions {
  level: LogLevel;
  format?: ConsoleFormat;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

/** `line` renders `<iso time> <LEVEL> [component] event {payload}`. */
export function formatLine(event: StructuredLogEvent): string {
  const time = new Date(event.timestamp).toISOString();
  const payload = event.payload && Object.keys(event.payload).length > 0 ? ` ${JSON.stringify(event.payload)}` : "";
  return `${time} ${event.level.toUpperCase()} [${event.component}] ${event.event}${payload}`;
}

export function createConsoleSink(options: ConsoleSinkOptions): LogSink {
  const consoleImpl = options.consoleImpl ?? console;
  const render = options.format === "line" ? formatLine : (event: StructuredLogEvent) => JSON.stringify(event);
  return {
    name: "console",
    level: options.level,
    async publish(event: StructuredLogEvent) {
      if (!shouldLog(event.level, options.level)) {
        return;
      }
      const payload = render(event);
      switch (event.level) {
        case LogLevel.DEBUG:
          consoleImpl.debug(payload);
          break;
        case LogLevel.WARN:
          consoleImpl.warn(payload);
          break;
        case LogLevel.ERROR:
        case LogLevel.CRITICAL:
          consoleImpl.error(payload);
          break;
        default:
          consoleImpl.info(payload);
      }
    }
  };
}

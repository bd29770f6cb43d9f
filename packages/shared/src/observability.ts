import { createHash } from "node:crypto";
import { UnknownEnumerationValueError } from "./errors";

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
  CRITICAL = "critical"
}

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.CRITICAL]: 50
};

export function shouldLog(target: LogLevel, minimum: LogLevel): boolean {
  return levelOrder[target] >= levelOrder[minimum];
}

export function parseLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  const level = Object.values(LogLevel).find(candidate => candidate === normalized);
  if (!level) {
    throw new UnknownEnumerationValueError("log level", value);
  }
  return level;
}

export interface StructuredLogEvent<TPayload = Record<string, unknown>> {
  sessionId: string;
  component: string;
  event: string;
  level: LogLevel;
  timestamp: number;
  payload?: TPayload;
  dedupKey?: string;
  tags?: string[];
}

/** The slice of a structured logger that parsing code depends on. */
export interface EventLogger {
  log(level: LogLevel, event: string, payload?: Record<string, unknown>): void;
}

export const silentLogger: EventLogger = {
  log: () => undefined
};

export function makeDedupKey(parts: Array<string | number | undefined | null>): string {
  const normalized = parts
    .filter(part => part !== undefined && part !== null)
    .map(part => String(part))
    .join("|");
  const hash = createHash("sha1");
  hash.update(normalized);
  return hash.digest("hex");
}

interface StructuredEventOptions<TPayload> {
  sessionId: string;
  component: string;
  level: LogLevel;
  event: string;
  payload?: TPayload;
  dedupParts?: Array<string | number | undefined | null>;
  timestamp?: number;
  tags?: string[];
}

export function createStructuredEvent<TPayload = Record<string, unknown>>(
  options: StructuredEventOptions<TPayload>
): StructuredLogEvent<TPayload> {
  return {
    sessionId: options.sessionId,
    component: options.component,
    level: options.level,
    event: options.event,
    timestamp: options.timestamp ?? Date.now(),
    payload: options.payload,
    tags: options.tags,
    dedupKey: options.dedupParts ? makeDedupKey(options.dedupParts) : undefined
  };
}

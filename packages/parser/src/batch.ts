import { HandHistoryError, LogLevel, StageFailedError, silentLogger, type EventLogger } from "@hh-parser/shared";
import { HandHistory } from "./handHistory";
import type { RoomAdapter } from "./rooms/types";

export interface BatchOptions {
  logger?: EventLogger;
  /** Rethrow the first failure instead of collecting it. */
  failFast?: boolean;
  /** Stop after the header; the body stages are not run. */
  headerOnly?: boolean;
}

export interface BatchFailure {
  index: number;
  /** File path, or `#<index>` for in-memory texts. */
  source: string;
  error: HandHistoryError;
}

export interface BatchResult {
  hands: HandHistory[];
  failures: BatchFailure[];
}

interface BatchItem {
  source: string;
  load: () => Promise<HandHistory>;
}

function asHandHistoryError(error: unknown): HandHistoryError {
  return error instanceof HandHistoryError ? error : new StageFailedError("load", error);
}

async function runBatch(items: BatchItem[], options: BatchOptions): Promise<BatchResult> {
  const logger = options.logger ?? silentLogger;
  const result: BatchResult = { hands: [], failures: [] };
  for (const [index, item] of items.entries()) {
    try {
      const hand = await item.load();
      if (options.headerOnly) {
        hand.parseHeader();
      } else {
        hand.parse();
      }
      result.hands.push(hand);
    } catch (error) {
      if (options.failFast) {
        throw error;
      }
      const failure = { index, source: item.source, error: asHandHistoryError(error) };
      result.failures.push(failure);
      logger.log(LogLevel.WARN, "batch.item_failed", {
        index,
        source: item.source,
        error: failure.error.message
      });
    }
  }
  logger.log(LogLevel.INFO, "batch.completed", {
    total: items.length,
    parsed: result.hands.length,
    failed: result.failures.length
  });
  return result;
}

/** Parses each text independently; one bad hand does not stop the rest unless `failFast`. */
export function parseHands(texts: readonly string[], adapter: RoomAdapter, options: BatchOptions = {}) {
  const logger = options.logger;
  return runBatch(
    texts.map((text, index) => ({
      source: `#${index}`,
      load: async () => HandHistory.fromText(text, adapter, { logger })
    })),
    options
  );
}

export function parseHandFiles(paths: readonly string[], adapter: RoomAdapter, options: BatchOptions = {}) {
  const logger = options.logger;
  return runBatch(
    paths.map(filePath => ({
      source: filePath,
      load: () => HandHistory.fromFile(filePath, adapter, { logger })
    })),
    options
  );
}

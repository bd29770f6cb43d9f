import {
  LogLevel,
  createStructuredEvent,
  shouldLog,
  type EventLogger,
  type StructuredLogEvent
} from "@hh-parser/shared";
import type { LogSink } from "./sinks/types";

export interface StructuredLoggerOptions {
  sessionId: string;
  component: string;
  level: LogLevel;
  sinks: LogSink[];
  queueSize?: number;
  defaultContext?: Record<string, unknown>;
  onDrop?: (event: StructuredLogEvent) => void;
  /** Receives sink failures; defaults to console.warn. */
  onSinkError?: (sink: LogSink, error: unknown) => void;
}

export interface LogOptions {
  component?: string;
  dedupParts?: Array<string | number | undefined | null>;
  tags?: string[];
}

export interface ChildLogger extends EventLogger {
  log(level: LogLevel, event: string, payload?: Record<string, unknown>, options?: LogOptions): void;
  child(component: string, defaultContext?: Record<string, unknown>): ChildLogger;
}

export class StructuredLogger implements ChildLogger {
  private readonly queue: StructuredLogEvent[] = [];
  private draining: Promise<void> | null = null;
  private stopped = false;
  private readonly queueSize: number;
  private readonly defaultContext: Record<string, unknown>;

  constructor(private readonly options: StructuredLoggerOptions) {
    this.queueSize = Math.max(100, options.queueSize ?? 1000);
    this.defaultContext = options.defaultContext ?? {};
  }

  get level(): LogLevel {
    return this.options.level;
  }

  async start() {
    await Promise.all(this.options.sinks.map(async sink => sink.start?.()));
  }

  async stop() {
    await this.flushOutstanding();
    this.stopped = true;
    await Promise.all(this.options.sinks.map(async sink => sink.stop?.()));
  }

  async flushOutstanding() {
    while (this.queue.length > 0 || this.draining) {
      await this.drainQueue();
    }
    await Promise.all(this.options.sinks.map(async sink => sink.flush?.()));
  }

  log(level: LogLevel, event: string, payload?: Record<string, unknown>, logOptions?: LogOptions) {
    if (this.stopped || !shouldLog(level, this.options.level)) {
      return;
    }
    const structured = createStructuredEvent({
      sessionId: this.options.sessionId,
      component: logOptions?.component ?? this.options.component,
      level,
      event,
      payload: { ...this.defaultContext, ...payload },
      dedupParts: logOptions?.dedupParts,
      tags: logOptions?.tags
    });
    if (this.queue.length >= this.queueSize) {
      this.options.onDrop?.(structured);
      return;
    }
    this.queue.push(structured);
    void this.drainQueue();
  }

  child(component: string, defaultContext?: Record<string, unknown>): ChildLogger {
    const mergedContext = { ...(defaultContext ?? {}) };
    return {
      log: (level, event, payload, options) => {
        this.log(level, event, { ...mergedContext, ...payload }, { ...options, component });
      },
      child: (nextComponent, childContext) =>
        this.child(nextComponent, { ...mergedContext, ...(childContext ?? {}) })
    };
  }

  private drainQueue(): Promise<void> {
    if (!this.draining) {
      this.draining = this.drain().finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  private async drain() {
    let next = this.queue.shift();
    while (next) {
      const event = next;
      await Promise.allSettled(
        this.options.sinks.map(async sink => {
          try {
            await sink.publish(event);
          } catch (error) {
            this.reportSinkError(sink, error);
          }
        })
      );
      next = this.queue.shift();
    }
  }

  private reportSinkError(sink: LogSink, error: unknown) {
    if (this.options.onSinkError) {
      this.options.onSinkError(sink, error);
      return;
    }
    console.warn(`[structured-logger] sink ${sink.name} failed`, error);
  }
}

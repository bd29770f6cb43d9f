export { StructuredLogger, type ChildLogger, type LogOptions, type StructuredLoggerOptions } from "./structuredLogger";
export { createConsoleSink, formatLine, type ConsoleFormat } from "./sinks/consoleSink";
export { createFileSink, type FileSinkOptions } from "./sinks/fileSink";
export { createLogger, type LoggerFactoryOptions } from "./factory";
export type { LogSink } from "./sinks/types";

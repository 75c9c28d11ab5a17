/**
 * packages/utils - Shared utilities
 */

export { LogLevel, logger, redactFields, redactUrl } from "./logger";
export type { LogRecord, LogSink, Logger } from "./logger";

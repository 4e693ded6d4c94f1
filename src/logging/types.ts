/**
 * Logging Types and Interfaces
 *
 * Types for the structured logging system used by the ingestion engine,
 * the output formatter and the CLI.
 *
 * @module logging/types
 */

/**
 * All valid log levels, ordered from highest to lowest severity:
 * - silent: Suppress all logging (typically used in tests)
 * - fatal: Unrecoverable failure
 * - error: A request failed
 * - warn: Something was skipped or truncated
 * - info: Progress of an ingestion (default)
 * - debug: Per-entry traversal decisions
 * - trace: Very detailed information, typically for development only
 */
export const LOG_LEVELS = ["silent", "fatal", "error", "warn", "info", "debug", "trace"] as const;

/**
 * Log levels supported by the logger
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default "info"
   */
  level: LogLevel;

  /**
   * Log output format
   * - json: Structured JSON lines
   * - pretty: Human-readable colorized output
   * @default "pretty"
   */
  format: "json" | "pretty";

  /**
   * Optional custom output stream
   * When provided, logs are written to this stream instead of stderr
   * @internal - Only used in tests for log capture
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Component context for child loggers
 */
export interface ComponentContext {
  /**
   * Component name, colon notation for hierarchy:
   * - "ingestion:traversal" - directory walker
   * - "ingestion:orchestrator" - ingest entry point
   * - "output:formatter" - digest formatter
   */
  component: string;

  /**
   * Optional request/correlation ID, typically the ingestion query id
   */
  requestId?: string;
}

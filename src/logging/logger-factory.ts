/**
 * Logger Factory
 *
 * Core logging infrastructure built on Pino: root logger creation,
 * configuration and component-scoped child loggers.
 *
 * Key features:
 * - Outputs to stderr (stdout carries the digest when the CLI writes to "-")
 * - JSON format for log aggregation, pretty-print for interactive use
 * - Component-based child loggers with automatic context
 *
 * @module logging/logger-factory
 */

import pino from "pino";
import type { LoggerConfig, ComponentContext } from "./types.js";

/**
 * Singleton root logger instance
 * Initialized once at application startup
 */
let rootLogger: pino.Logger | null = null;

/**
 * Shared options for every root logger variant
 */
function baseOptions(config: LoggerConfig): pino.LoggerOptions {
  return {
    level: config.level,

    // ISO 8601 timestamps for all formats
    timestamp: pino.stdTimeFunctions.isoTime,

    // Format log level as string (not number)
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

/**
 * Create the root Pino logger with full configuration
 *
 * @param config - Logger configuration (level, format, optional stream)
 * @returns Configured Pino logger instance
 *
 * @internal
 */
function createRootLogger(config: LoggerConfig): pino.Logger {
  const pinoOptions = baseOptions(config);

  // If custom stream provided (for testing), use it directly
  if (config.stream) {
    return pino(pinoOptions, config.stream);
  }

  if (config.format === "pretty") {
    return pino({
      ...pinoOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          singleLine: false,
          destination: 2,
        },
      },
    });
  }

  // JSON format to stderr (file descriptor 2)
  return pino(pinoOptions, pino.destination(2));
}

/**
 * Initialize the global logger
 *
 * Must be called once at application startup before any logging occurs.
 * Subsequent calls will throw an error.
 *
 * @param config - Logger configuration
 * @throws Error if logger is already initialized
 *
 * @example
 * ```typescript
 * import { initializeLogger } from './logging/index.js';
 *
 * initializeLogger({ level: "info", format: "pretty" });
 * ```
 */
export function initializeLogger(config: LoggerConfig): void {
  if (rootLogger !== null) {
    throw new Error("Logger already initialized. initializeLogger() should only be called once.");
  }

  try {
    rootLogger = createRootLogger(config);
    rootLogger.debug({ config: { level: config.level, format: config.format } }, "Logger initialized");
  } catch (error) {
    // pino-pretty may be missing: fall back to a plain JSON logger on stderr
    rootLogger = pino(baseOptions({ level: config.level, format: "json" }), pino.destination(2));

    rootLogger.warn(
      {
        requestedFormat: config.format,
        fallbackFormat: "json",
        error: error instanceof Error ? error.message : String(error),
      },
      "Logger initialization failed, using fallback JSON logger"
    );
  }
}

/**
 * Get the root logger instance
 *
 * @returns Root logger instance
 * @throws Error if logger not initialized
 *
 * @internal - Most code should use getComponentLogger() instead
 */
export function getRootLogger(): pino.Logger {
  if (rootLogger === null) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return rootLogger;
}

/**
 * Get a component-scoped logger
 *
 * Creates a child logger whose every line carries the component name and,
 * when given, a request ID.
 *
 * @param component - Component name (use colon notation for hierarchy)
 * @param requestId - Optional request/correlation ID for tracing
 * @returns Child logger with component context
 *
 * @example
 * ```typescript
 * const logger = getComponentLogger('ingestion:traversal');
 * logger.debug({ path: 'src/big.bin' }, 'Skipping oversized file');
 * // Output: {"level":"debug","component":"ingestion:traversal",...}
 * ```
 */
export function getComponentLogger(component: string, requestId?: string): pino.Logger {
  const root = getRootLogger();

  const context: ComponentContext = {
    component,
    ...(requestId && { requestId }),
  };

  return root.child(context);
}

/**
 * Reset logger (for testing only)
 *
 * Clears the singleton root logger to allow re-initialization.
 *
 * @internal
 */
export function resetLogger(): void {
  rootLogger = null;
}

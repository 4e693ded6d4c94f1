/**
 * Logging Module - Public API
 *
 * Structured logging for the digest engine, built on Pino with
 * component-based context.
 *
 * ## Quick Start
 *
 * ```typescript
 * // 1. Initialize logger at startup (once)
 * import { initializeLogger } from './logging/index.js';
 *
 * initializeLogger({ level: 'info', format: 'pretty' });
 *
 * // 2. Get a component logger in your modules
 * import { getComponentLogger } from './logging/index.js';
 *
 * const logger = getComponentLogger('ingestion:traversal');
 * logger.info('Traversal started');
 * logger.error({ err }, 'Traversal failed');
 * ```
 *
 * ## Environment Variables
 *
 * - `LOG_LEVEL`: Log level (silent|fatal|error|warn|info|debug|trace) - default: warn
 * - `LOG_FORMAT`: Output format (json|pretty) - default: pretty
 *
 * @module logging
 */

export * from "./types.js";

export {
  initializeLogger,
  getComponentLogger,
  getRootLogger,
  resetLogger,
} from "./logger-factory.js";

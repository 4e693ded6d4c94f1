/**
 * repo-digest - Library Entry Point
 *
 * Turns a local repository into a single text digest (summary, directory
 * tree and file contents) under size, depth and file-count limits.
 *
 * @example
 * ```typescript
 * import { initializeLogger, ingest } from "repo-digest";
 *
 * initializeLogger({ level: "warn", format: "json" });
 * const { summary, tree, content } = await ingest("./my-project", { includePatterns: "*.ts" });
 * ```
 */

export * from "./ingestion/index.js";
export * from "./output/index.js";
export * from "./config/index.js";
export {
  initializeLogger,
  getComponentLogger,
  resetLogger,
  type LogLevel,
  type LoggerConfig,
} from "./logging/index.js";

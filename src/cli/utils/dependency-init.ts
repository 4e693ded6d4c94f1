/**
 * Dependency Initialization for CLI
 *
 * Sets up logging and loads the digest configuration before a command runs.
 */

import type { Logger } from "pino";
import { z } from "zod";
import { loadDigestConfig, type DigestConfig } from "../../config/index.js";
import {
  initializeLogger,
  getComponentLogger,
  LOG_LEVELS,
  type LoggerConfig,
} from "../../logging/index.js";

/**
 * All dependencies required by CLI commands
 */
export interface CliDependencies {
  config: DigestConfig;
  logger: Logger;
}

/**
 * Logging environment for the CLI
 *
 * The CLI defaults to "warn" so that log lines do not interleave with the spinner.
 */
const LoggingEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("pretty"),
});

/**
 * Read the logger configuration from environment variables
 *
 * Unset or empty values fall back to the defaults.
 *
 * @throws {Error} If LOG_LEVEL or LOG_FORMAT holds an unknown value
 */
export function loadCliLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const result = LoggingEnvSchema.safeParse({
    LOG_LEVEL: env["LOG_LEVEL"] || undefined,
    LOG_FORMAT: env["LOG_FORMAT"] || undefined,
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid logging configuration: ${details}`);
  }

  return { level: result.data.LOG_LEVEL, format: result.data.LOG_FORMAT };
}

/**
 * Initialize all dependencies for CLI commands
 *
 * @throws {Error} If an environment variable holds an invalid value
 */
export function initializeDependencies(env: NodeJS.ProcessEnv = process.env): CliDependencies {
  initializeLogger(loadCliLoggerConfig(env));

  const logger = getComponentLogger("cli");
  const config = loadDigestConfig(env);

  logger.debug({ limits: config.limits }, "CLI dependencies initialized");

  return { config, logger };
}

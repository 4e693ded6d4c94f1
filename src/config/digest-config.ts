/**
 * Digest Configuration Module
 *
 * Process-wide limits for ingestion: traversal depth, file count, total
 * size and the default per-file size cap. Values come from environment
 * variables when set and are read-only once loaded.
 *
 * @module config/digest-config
 */

import { z } from "zod";

/**
 * Hard limits enforced while walking a directory tree
 */
export interface TraversalLimits {
  /** Deepest directory level that is still expanded (root = 0) */
  maxDirectoryDepth: number;
  /** Maximum number of files (and symlinks) recorded per ingestion */
  maxFiles: number;
  /** Maximum total bytes of file content recorded per ingestion */
  maxTotalSizeBytes: number;
}

/**
 * Full digest configuration
 */
export interface DigestConfig {
  /** Traversal limits */
  limits: TraversalLimits;
  /** Per-file size cap used when a query does not set one */
  defaultMaxFileSize: number;
  /** File name the CLI writes to when no output is given */
  outputFileName: string;
}

/**
 * Default configuration
 *
 * - Depth 20, 10,000 files, 500 MB in total
 * - 10 MB per file
 */
export const DEFAULT_DIGEST_CONFIG: DigestConfig = {
  limits: {
    maxDirectoryDepth: 20,
    maxFiles: 10_000,
    maxTotalSizeBytes: 500 * 1024 * 1024,
  },
  defaultMaxFileSize: 10 * 1024 * 1024,
  outputFileName: "digest.txt",
};

/**
 * Environment variable names for digest configuration
 */
export const ENV_KEYS = {
  MAX_DIRECTORY_DEPTH: "DIGEST_MAX_DIRECTORY_DEPTH",
  MAX_FILES: "DIGEST_MAX_FILES",
  MAX_TOTAL_SIZE_BYTES: "DIGEST_MAX_TOTAL_SIZE_BYTES",
  MAX_FILE_SIZE: "DIGEST_MAX_FILE_SIZE",
  OUTPUT_FILE_NAME: "DIGEST_OUTPUT_FILE",
} as const;

/**
 * Optional positive integer read from a string environment value
 */
function positiveIntFromEnv(name: string) {
  return z
    .string()
    .trim()
    .regex(/^\d+$/, `${name} must be a positive integer`)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().min(1, `${name} must be at least 1`))
    .optional();
}

/**
 * Zod schema for the environment variables this module reads
 *
 * Empty strings are treated as unset before validation.
 */
export const DigestEnvSchema = z.object({
  [ENV_KEYS.MAX_DIRECTORY_DEPTH]: positiveIntFromEnv(ENV_KEYS.MAX_DIRECTORY_DEPTH),
  [ENV_KEYS.MAX_FILES]: positiveIntFromEnv(ENV_KEYS.MAX_FILES),
  [ENV_KEYS.MAX_TOTAL_SIZE_BYTES]: positiveIntFromEnv(ENV_KEYS.MAX_TOTAL_SIZE_BYTES),
  [ENV_KEYS.MAX_FILE_SIZE]: positiveIntFromEnv(ENV_KEYS.MAX_FILE_SIZE),
  [ENV_KEYS.OUTPUT_FILE_NAME]: z.string().trim().min(1).optional(),
});

/**
 * Drop unset and empty values so that defaults apply
 */
function pickDefined(
  env: NodeJS.ProcessEnv,
  keys: readonly string[]
): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      picked[key] = value;
    }
  }
  return picked;
}

/**
 * Load digest configuration from environment variables
 *
 * Environment variables:
 * - DIGEST_MAX_DIRECTORY_DEPTH: Deepest expanded directory level (default: 20)
 * - DIGEST_MAX_FILES: Maximum files per ingestion (default: 10000)
 * - DIGEST_MAX_TOTAL_SIZE_BYTES: Maximum total bytes per ingestion (default: 524288000)
 * - DIGEST_MAX_FILE_SIZE: Default per-file cap in bytes (default: 10485760)
 * - DIGEST_OUTPUT_FILE: CLI output file name (default: digest.txt)
 *
 * @param env - Environment to read (defaults to process.env)
 * @returns Validated configuration
 * @throws {Error} If a variable is set to an invalid value
 */
export function loadDigestConfig(env: NodeJS.ProcessEnv = process.env): DigestConfig {
  const result = DigestEnvSchema.safeParse(pickDefined(env, Object.values(ENV_KEYS)));

  if (!result.success) {
    const details = result.error.issues.map((issue) => issue.message).join("; ");
    throw new Error(`Invalid digest configuration: ${details}`);
  }

  const parsed = result.data;
  const defaults = DEFAULT_DIGEST_CONFIG;

  return {
    limits: {
      maxDirectoryDepth:
        parsed[ENV_KEYS.MAX_DIRECTORY_DEPTH] ?? defaults.limits.maxDirectoryDepth,
      maxFiles: parsed[ENV_KEYS.MAX_FILES] ?? defaults.limits.maxFiles,
      maxTotalSizeBytes:
        parsed[ENV_KEYS.MAX_TOTAL_SIZE_BYTES] ?? defaults.limits.maxTotalSizeBytes,
    },
    defaultMaxFileSize: parsed[ENV_KEYS.MAX_FILE_SIZE] ?? defaults.defaultMaxFileSize,
    outputFileName: parsed[ENV_KEYS.OUTPUT_FILE_NAME] ?? defaults.outputFileName,
  };
}

/**
 * Cached process-wide configuration
 */
let cachedConfig: DigestConfig | null = null;

/**
 * Get the process-wide digest configuration
 *
 * Loaded from process.env on first call and reused afterwards.
 */
export function getDigestConfig(): DigestConfig {
  if (cachedConfig === null) {
    cachedConfig = loadDigestConfig();
  }
  return cachedConfig;
}

/**
 * Forget the cached configuration (for testing only)
 *
 * @internal
 */
export function resetDigestConfig(): void {
  cachedConfig = null;
}

/**
 * Runtime validation schemas for CLI command options
 *
 * Uses Zod for type-safe runtime validation of Commander.js options.
 */

import { z } from "zod";

/**
 * Schema for digest command options
 */
export const DigestCommandOptionsSchema = z.object({
  output: z.string().min(1, "output must not be empty").optional(),
  maxSize: z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : undefined))
    .pipe(
      z
        .number()
        .int("max-size must be a whole number of bytes")
        .min(1, "max-size must be at least 1 byte")
        .optional()
    ),
  excludePattern: z.array(z.string()).optional(),
  includePattern: z.array(z.string()).optional(),
  includeGitignored: z.boolean().optional(),
});

export type DigestCommandOptions = z.infer<typeof DigestCommandOptionsSchema>;

/**
 * Digest Command - Write the digest of a local directory
 *
 * Ingests a directory or file, writes tree and content to the output file
 * (or stdout) and prints the summary.
 */

/* eslint-disable no-console */

import { writeFile } from "node:fs/promises";
import chalk from "chalk";
import { ingest } from "../../ingestion/index.js";
import type { Digest } from "../../output/index.js";
import { completeDigestSpinner, createDigestSpinner } from "../output/progress.js";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { DigestCommandOptions } from "../utils/validation.js";

/**
 * Output name that selects stdout
 */
export const STDOUT_OUTPUT = "-";

/**
 * Text written to the output: the tree followed by the file contents
 */
export function renderDigestFile(digest: Digest): string {
  return `${digest.tree}\n${digest.content}`;
}

/**
 * Execute digest command
 *
 * @param source - Directory or file to ingest
 * @param options - Validated command options
 * @param deps - CLI dependencies
 * @returns The digest that was written
 */
export async function digestCommand(
  source: string,
  options: DigestCommandOptions,
  deps: CliDependencies
): Promise<Digest> {
  const output = options.output ?? deps.config.outputFileName;
  const toStdout = output === STDOUT_OUTPUT;
  const spinner = createDigestSpinner(source);

  let digest: Digest;
  try {
    digest = await ingest(source, {
      maxFileSize: options.maxSize ?? deps.config.defaultMaxFileSize,
      excludePatterns: options.excludePattern,
      includePatterns: options.includePattern,
      includeGitignored: options.includeGitignored ?? false,
      limits: deps.config.limits,
    });

    if (toStdout) {
      process.stdout.write(renderDigestFile(digest));
    } else {
      await writeFile(output, renderDigestFile(digest), "utf-8");
    }
  } catch (error) {
    completeDigestSpinner(
      spinner,
      false,
      undefined,
      error instanceof Error ? error.message : String(error)
    );
    throw error;
  }

  completeDigestSpinner(spinner, true, toStdout ? "stdout" : output);
  deps.logger.debug({ source, output }, "Digest written");

  // Keep stdout clean for the digest itself
  const print = toStdout ? console.error : console.log;
  print(chalk.bold("\nSummary:"));
  print(digest.summary);

  return digest;
}

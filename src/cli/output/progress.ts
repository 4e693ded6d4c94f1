/**
 * Progress Indicators for CLI
 *
 * Spinner shown on stderr while a digest is being produced.
 */

import ora, { type Ora } from "ora";
import chalk from "chalk";

/**
 * Create a spinner for a digest operation
 *
 * @param source - Directory or file being ingested
 * @returns Ora spinner instance
 */
export function createDigestSpinner(source: string): Ora {
  const spinner = ora({
    text: `Analyzing ${chalk.cyan(source)}...`,
    color: "cyan",
  }).start();

  return spinner;
}

/**
 * Complete spinner with success or failure message
 *
 * @param spinner - Ora spinner instance
 * @param success - Whether the operation succeeded
 * @param destination - Where the digest was written (if successful)
 * @param errorMessage - Error message (if failed)
 */
export function completeDigestSpinner(
  spinner: Ora,
  success: boolean,
  destination?: string,
  errorMessage?: string
): void {
  if (success) {
    spinner.succeed(
      chalk.green("Analysis complete!") +
        (destination ? `\n  Output written to: ${chalk.cyan(destination)}` : "")
    );
  } else {
    spinner.fail(chalk.red("Analysis failed") + (errorMessage ? `\n  ${errorMessage}` : ""));
  }
}

/**
 * Centralized Error Handler for CLI Commands
 *
 * Maps ingestion errors to user-friendly messages with actionable next steps.
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { Ora } from "ora";
import { ZodError } from "zod";
import {
  EmptyContentError,
  IngestionError,
  InvalidPatternError,
  PathNotFoundError,
  UnsupportedNodeTypeError,
  ValidationError,
} from "../../ingestion/index.js";

/**
 * Handle command errors and exit with appropriate status code
 *
 * This function stops any active spinner, displays a formatted error message,
 * and exits the process with code 1.
 *
 * @param error - The error to handle
 * @param spinner - Optional spinner to stop before showing error
 */
export function handleCommandError(error: unknown, spinner?: Ora): never {
  // Stop spinner if provided
  if (spinner && spinner.isSpinning) {
    spinner.stop();
  }

  console.error(); // Blank line for spacing

  // Handle invalid command options
  if (error instanceof ZodError) {
    console.error(chalk.red("✗ Invalid Options"));
    for (const issue of error.issues) {
      const option = issue.path.join(".");
      console.error(`  • ${option ? chalk.cyan(option) + ": " : ""}${issue.message}`);
    }
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Show usage: " + chalk.gray("repo-digest --help"));
    process.exit(1);
  }

  if (error instanceof InvalidPatternError) {
    console.error(chalk.red("✗ Invalid Pattern"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Example:"));
    console.error("  " + chalk.gray('repo-digest . -i "*.ts" -e "tests/" -e "*.md"'));
    process.exit(1);
  }

  if (error instanceof PathNotFoundError) {
    console.error(chalk.red("✗ Path Not Found"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Check the path exists: " + chalk.gray(`ls ${error.path}`));
    console.error("  • Run from the project root: " + chalk.gray("repo-digest ."));
    process.exit(1);
  }

  if (error instanceof EmptyContentError) {
    console.error(chalk.red("✗ Empty File"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Point the command at a file with content, or at its directory");
    process.exit(1);
  }

  if (error instanceof UnsupportedNodeTypeError) {
    console.error(chalk.red("✗ Unsupported Path"));
    console.error(`\n${error.message}`);
    console.error("\nOnly regular files and directories can be ingested.");
    process.exit(1);
  }

  if (error instanceof ValidationError) {
    console.error(chalk.red("✗ Invalid Request"));
    console.error(`\n${error.message}`);
    console.error(`\nField: ${chalk.cyan(error.field)}`);
    process.exit(1);
  }

  if (error instanceof IngestionError) {
    console.error(chalk.red("✗ Ingestion Error"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Check the error message above for specific details");
    console.error("  • Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug repo-digest <source>"));
    process.exit(1);
  }

  // Handle generic Error instances
  if (error instanceof Error) {
    console.error(chalk.red("✗ Error"));
    console.error(`\n${error.message}`);

    // Show stack trace in verbose mode
    if (process.env["LOG_LEVEL"] === "debug" || process.env["LOG_LEVEL"] === "trace") {
      console.error("\n" + chalk.gray(error.stack || "No stack trace available"));
    }

    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug repo-digest <source>"));
    console.error("  • Check DIGEST_* and LOG_* settings in your .env file");
    process.exit(1);
  }

  // Handle unknown error types
  console.error(chalk.red("✗ Unknown Error"));
  console.error(`\n${String(error)}`);
  console.error("\n" + chalk.bold("Next steps:"));
  console.error("  • Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug repo-digest <source>"));
  process.exit(1);
}

/**
 * Command-line program definition
 *
 * Kept apart from the entry point so the program can be built without
 * parsing process.argv.
 */

import { Command } from "commander";
import { digestCommand } from "./commands/digest-command.js";
import { initializeDependencies } from "./utils/dependency-init.js";
import { handleCommandError } from "./utils/error-handler.js";
import { DigestCommandOptionsSchema } from "./utils/validation.js";

/**
 * Build the repo-digest program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("repo-digest")
    .description("Turn a local repository into a text digest for language models")
    .version("1.0.0")
    .argument("[source]", "Directory or file to analyze", ".")
    .option("-o, --output <file>", 'Output file ("-" for stdout, default: digest.txt)')
    .option("-s, --max-size <bytes>", "Maximum size of a file to include, in bytes")
    .option("-e, --exclude-pattern <pattern...>", "Patterns to exclude (repeatable)")
    .option("-i, --include-pattern <pattern...>", "Patterns to include (repeatable)")
    .option("--include-gitignored", "Include files matched by .gitignore")
    .action(async (source: string, options: Record<string, unknown>) => {
      try {
        const validatedOptions = DigestCommandOptionsSchema.parse(options);
        const deps = initializeDependencies();
        await digestCommand(source, validatedOptions, deps);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return program;
}

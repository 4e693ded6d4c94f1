#!/usr/bin/env tsx
/**
 * repo-digest - CLI Entry Point
 *
 * Analyzes a local directory and writes its digest:
 *   repo-digest [source] [-o file] [-s bytes] [-e pattern...] [-i pattern...] [--include-gitignored]
 */

import "dotenv/config";
import { createProgram } from "./program.js";

await createProgram().parseAsync(process.argv);

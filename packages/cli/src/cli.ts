#!/usr/bin/env node

/**
 * Bookshelf CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import { mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";
import { isVerbose } from "./lib/env.js";

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already reported its own parse errors, help and version output
    if (err instanceof CommanderError && err.code !== "commander.invalidArgument") {
      process.exit(err.exitCode);
    }

    const verbose = program.opts<{ verbose?: boolean }>().verbose === true || isVerbose();
    console.error(`Error: ${formatCliError(err, verbose)}`);
    process.exit(mapSdkErrorToExitCode(err));
  }
}

void main();

/**
 * Command tree for the bookshelf CLI
 */

import { Command } from "commander";
import { SERVICE_VERSION } from "@bookshelf/sdk";
import { registerApplyCommand } from "./commands/apply.js";
import { registerInfoCommand } from "./commands/info.js";
import { colorize } from "./lib/render.js";

/**
 * Build the program; errors surface as rejections of parseAsync instead of exiting
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride((err) => {
      throw err;
    });

  program
    .name("bookshelf")
    .description("Bookshelf - in-memory author and book catalog")
    .version(SERVICE_VERSION)
    .option("--verbose", "Verbose diagnostics on stderr");

  registerApplyCommand(program);
  registerInfoCommand(program);

  return program;
}

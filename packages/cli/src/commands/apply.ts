/**
 * `bookshelf apply`: run a plan against a fresh catalog
 */

import type { Command } from "commander";
import { assertSingleSource } from "../lib/arg.js";
import { emitCatalogMetrics, openCliCatalog } from "../lib/catalog.js";
import { isVerbose } from "../lib/env.js";
import { readJsonInput } from "../lib/io.js";
import { parsePlan, runPlan } from "../lib/plan.js";
import { printJson } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface ApplyOptions {
  file?: string;
  data?: string;
  raw?: boolean;
}

export function registerApplyCommand(program: Command): void {
  program
    .command("apply")
    .description("Run a JSON plan of catalog steps in order and print each result")
    .option("--file <path>", "Read the plan from a JSON file")
    .option("--data <json>", "Inline JSON plan")
    .option("--raw", "Print compact JSON")
    .addHelpText(
      "after",
      `
Example plan:
  [
    { "op": "author.create", "name": "Jane Doe", "as": "jane" },
    { "op": "book.create", "title": "Example", "author_ids": ["@jane"] },
    { "op": "author.get", "id": "@jane" }
  ]`
    )
    .action(async (options: ApplyOptions) => {
      const verbose = program.opts<{ verbose?: boolean }>().verbose === true || isVerbose();

      const apply = async (): Promise<void> => {
        assertSingleSource({ "--file": options.file, "--data": options.data });
        const steps = parsePlan(await readJsonInput(options));

        const { catalog, metrics } = openCliCatalog(verbose);
        const outcome = await runPlan(catalog, steps);
        printJson(outcome.results, { raw: options.raw });

        emitCatalogMetrics(metrics, verbose);
        if (outcome.failure) {
          throw outcome.failure;
        }
      };

      await withTiming("cli.apply", apply, verbose);
    });
}

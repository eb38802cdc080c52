/**
 * `bookshelf info`: static service description
 */

import type { Command } from "commander";
import { apiStatus, describeService, healthReport } from "@bookshelf/sdk";
import { printJson } from "../lib/render.js";

export const CLI_SERVICE_NAME = "bookshelf-cli";

export function serviceOverview() {
  return {
    service: describeService(),
    health: healthReport(CLI_SERVICE_NAME),
    api: apiStatus(),
  };
}

export function registerInfoCommand(program: Command): void {
  program
    .command("info")
    .description("Print service info, health and API status")
    .option("--raw", "Print compact JSON")
    .action((options: { raw?: boolean }) => {
      printJson(serviceOverview(), { raw: options.raw });
    });
}

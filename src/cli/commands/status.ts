import { runReconciliation } from "./sync.js";

import type { CommonOptions } from "../utils/setup.js";
import type { Command } from "commander";

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description(
      "Show what a sync would create, update, skip or delete (dry run)"
    )
    .option("--services <list>", "Comma-separated services to check")
    .option("--content-dir <dir>", "Directory of markdown documents")
    .action(async (options: CommonOptions) => {
      await runReconciliation(options, { dryRun: true });
    });
}

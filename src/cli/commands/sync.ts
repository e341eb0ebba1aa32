import ora from "ora";

import { createConnectors } from "../../connectors/registry.js";
import { scanDocuments } from "../../content/scanner.js";
import { cliLogger } from "../../logger.js";
import { displayReport } from "../utils/display.js";
import {
  createEngine,
  describeError,
  resolveConfig,
  type CommonOptions,
} from "../utils/setup.js";

import type { Command } from "commander";

// ============================================================================
// Sync Command
// ============================================================================

interface SyncCommandOptions extends CommonOptions {
  dryRun?: boolean;
  /** false when --no-delete is given */
  delete: boolean;
}

/**
 * Scan, reconcile and print the report. Shared by `sync` and `status`.
 */
export async function runReconciliation(
  options: CommonOptions,
  run: { dryRun: boolean; deleteOrphans?: boolean }
): Promise<void> {
  const spinner = ora("Scanning documents...").start();
  const controller = new AbortController();

  const onInterrupt = (): void => {
    cliLogger.warn("Interrupt received, stopping after the current document");
    spinner.text = "Cancelling after the current document...";
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const config = resolveConfig(options);
    const { documents, skipped } = await scanDocuments({
      contentDir: config.contentDir,
      exclude: config.excludeFiles,
    });

    const connectors = createConnectors(config);
    const engine = createEngine(
      config,
      connectors,
      run.deleteOrphans ?? config.deleteOrphans
    );
    engine.setProgressCallback((progress) => {
      if (controller.signal.aborted) return;
      spinner.text = `${progress.phase}: ${String(progress.current)}/${String(progress.total)} (${progress.currentItem ?? ""})`;
    });

    const report = await engine.run(documents, {
      signal: controller.signal,
      dryRun: run.dryRun,
      skippedFiles: skipped,
    });

    const verb = run.dryRun ? "Planned" : "Reconciled";
    const message = `${verb} ${String(documents.length)} document(s) across ${String(connectors.length)} service(s)`;
    if (report.failed) {
      spinner.fail(`${message} with failures`);
      process.exitCode = 1;
    } else if (report.cancelled) {
      spinner.warn(`${message} (cancelled)`);
    } else {
      spinner.succeed(message);
    }

    displayReport(report);
  } catch (error) {
    spinner.fail(`Failed: ${describeError(error)}`);
    process.exitCode = 1;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description(
      "Create, update and remove articles so every service mirrors the content directory"
    )
    .option("--dry-run", "Show what would change without writing anything")
    .option("--no-delete", "Keep remote articles that have no local document")
    .option(
      "--services <list>",
      "Comma-separated services to reconcile (default: ENABLED_PLATFORMS)"
    )
    .option("--content-dir <dir>", "Directory of markdown documents")
    .action(async (options: SyncCommandOptions) => {
      await runReconciliation(options, {
        dryRun: options.dryRun === true,
        ...(options.delete ? {} : { deleteOrphans: false }),
      });
    });
}

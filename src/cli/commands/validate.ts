import chalk from "chalk";
import CliTable3 from "cli-table3";
import ora from "ora";

import { createConnectors } from "../../connectors/registry.js";
import { loadSnapshot } from "../../services/reconcile/index.js";
import { serviceName } from "../utils/display.js";
import {
  describeError,
  resolveConfig,
  type CommonOptions,
} from "../utils/setup.js";

import type { Command } from "commander";

/**
 * Check each enabled service: credentials present, listing reachable
 */
export function registerValidateCommand(program: Command): void {
  program
    .command("validate")
    .description("Check credentials and connectivity for each service")
    .option("--services <list>", "Comma-separated services to check")
    .action(async (options: CommonOptions) => {
      const spinner = ora("Validating services...").start();

      try {
        const config = resolveConfig(options);
        const connectors = createConnectors(config);

        const table = new CliTable3({
          head: [
            chalk.cyan("Service"),
            chalk.cyan("Status"),
            chalk.cyan("Articles"),
            chalk.cyan("Detail"),
          ],
          colWidths: [12, 22, 10, 60],
          wordWrap: true,
        });

        let healthy = true;
        for (const kind of config.services) {
          const connector = connectors.find((c) => c.kind === kind);
          if (!connector) {
            healthy = false;
            table.push([
              serviceName(kind),
              chalk.red("missing credentials"),
              "-",
              "See the error log above",
            ]);
            continue;
          }

          spinner.text = `Listing ${serviceName(kind)} articles...`;
          const snapshot = await loadSnapshot(connector, {
            ...config.retry,
            rateLimitDelayMs: config[kind].rateLimitMs,
          });

          if (snapshot.status === "ok") {
            table.push([
              serviceName(kind),
              chalk.green("ok"),
              String(snapshot.articles.length),
              "",
            ]);
          } else {
            healthy = false;
            table.push([
              serviceName(kind),
              chalk.red(snapshot.error?.category ?? snapshot.status),
              "-",
              snapshot.error?.message ?? "",
            ]);
          }
        }

        if (healthy) {
          spinner.succeed("All services reachable");
        } else {
          spinner.fail("Some services are not usable");
          process.exitCode = 1;
        }
        console.log(table.toString());
      } catch (error) {
        spinner.fail(`Failed: ${describeError(error)}`);
        process.exitCode = 1;
      }
    });
}

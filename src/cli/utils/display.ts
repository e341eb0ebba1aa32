/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { ReconciliationReport } from "../../services/reconcile/index.js";
import type { OutcomeLabel } from "../../services/reconcile/results.js";
import type { RemoteArticle, ServiceKind } from "../../types/index.js";

const SERVICE_NAMES: Record<ServiceKind, string> = {
  devto: "dev.to",
  hashnode: "Hashnode",
};

export function serviceName(kind: ServiceKind): string {
  return SERVICE_NAMES[kind];
}

export function colorOutcome(label: OutcomeLabel): string {
  switch (label) {
    case "created":
      return chalk.green(label);
    case "updated":
      return chalk.cyan(label);
    case "skipped":
      return chalk.gray(label);
    case "deleted":
      return chalk.magenta(label);
    case "warning":
      return chalk.yellow(label);
    case "failed":
      return chalk.red(label);
    default:
      return chalk.blue(label);
  }
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 3) + "..." : text;
}

/**
 * Per-document outcome table, problem details and summary line
 */
export function displayReport(report: ReconciliationReport): void {
  const services = report.snapshots.map((s) => s.service);

  const table = new CliTable3({
    head: [
      chalk.cyan("Document"),
      ...services.map((s) => chalk.cyan(serviceName(s))),
    ],
    wordWrap: true,
  });

  for (const doc of report.summary) {
    const row = [truncate(doc.title, 60)];
    for (const service of services) {
      const labels = doc.outcomes
        .filter((o) => o.service === service)
        .map((o) => colorOutcome(o.outcome));
      row.push(labels.length > 0 ? labels.join(", ") : chalk.gray("-"));
    }
    table.push(row);
  }

  if (report.summary.length > 0) {
    console.log(table.toString());
  } else {
    console.log(chalk.yellow("No documents or remote articles to report"));
  }

  const problems = report.results.filter(
    (r) => !r.success || r.warning === true
  );
  if (problems.length > 0) {
    console.log(chalk.bold("\nProblems:"));
    for (const result of problems) {
      const marker = result.success ? chalk.yellow("!") : chalk.red("✗");
      const category = result.errorCategory ?? "unknown";
      console.log(
        `  ${marker} [${serviceName(result.service)}] ${result.title} (${result.action}, ${category}): ${result.message ?? ""}`
      );
    }
  }

  for (const snapshot of report.snapshots) {
    if (snapshot.status !== "ok") {
      console.log(
        chalk.yellow(
          `\n${serviceName(snapshot.service)} listing ${snapshot.status}: ${snapshot.error ?? ""}`
        )
      );
    }
  }

  if (report.orphanSweep === "incomplete-scan") {
    console.log(
      chalk.yellow(
        "\nOrphan deletion skipped, these files have unusable frontmatter:"
      )
    );
    for (const path of report.skippedFiles) {
      console.log(chalk.yellow(`  ${path}`));
    }
  }

  const { counts } = report;
  console.log("\n" + "═".repeat(80));
  console.log(
    [
      chalk.green(`${String(counts.created)} created`),
      chalk.cyan(`${String(counts.updated)} updated`),
      chalk.gray(`${String(counts.skipped)} skipped`),
      chalk.magenta(`${String(counts.deleted)} deleted`),
      chalk.yellow(`${String(counts.warning)} warnings`),
      chalk.red(`${String(counts.failed)} failed`),
      ...(report.dryRun ? [chalk.blue(`${String(counts.planned)} planned`)] : []),
    ].join("  ")
  );
  if (report.cancelled) {
    console.log(chalk.yellow("Run cancelled before all documents were processed"));
  }
  console.log(
    chalk.gray(`Finished in ${(report.durationMs / 1000).toFixed(1)}s`)
  );
  console.log("═".repeat(80));
}

/**
 * Display a service's articles in a table
 */
export function displayArticlesTable(articles: RemoteArticle[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("ID"),
      chalk.cyan("Title"),
      chalk.cyan("Status"),
      chalk.cyan("Created"),
    ],
    colWidths: [26, 56, 11, 12],
    wordWrap: true,
  });

  for (const article of articles) {
    table.push([
      article.id,
      article.title,
      article.published ? chalk.green("published") : chalk.yellow("draft"),
      article.createdAt.split("T")[0] ?? "",
    ]);
  }

  console.log(table.toString());
  console.log(chalk.gray(`\n${String(articles.length)} article(s)\n`));
}

/**
 * Display one article's metadata
 */
export function displayArticle(article: RemoteArticle): void {
  console.log(chalk.bold.underline(`\n${article.title}\n`));

  console.log(`  Service:   ${serviceName(article.service)}`);
  console.log(`  ID:        ${article.id}`);
  console.log(
    `  Status:    ${article.published ? chalk.green("published") : chalk.yellow("draft")}`
  );
  console.log(`  Tags:      ${article.tags.join(", ") || chalk.gray("none")}`);
  console.log(`  Cover:     ${article.coverUrl || chalk.gray("none")}`);
  console.log(`  Created:   ${article.createdAt || chalk.gray("N/A")}`);
  console.log(`  Updated:   ${article.updatedAt ?? chalk.gray("N/A")}`);
  if (article.url !== undefined) {
    console.log(`  URL:       ${article.url}`);
  }
  console.log(
    chalk.gray(`\n  ${String(article.body.length)} characters of markdown\n`)
  );
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}

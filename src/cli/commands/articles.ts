import ora from "ora";

import { createConnectors } from "../../connectors/registry.js";
import { ConfigurationError } from "../../errors.js";
import { isServiceKind } from "../../types/index.js";
import {
  displayArticle,
  displayArticlesTable,
  printError,
  serviceName,
} from "../utils/display.js";
import { describeError, resolveConfig } from "../utils/setup.js";

import type { Command } from "commander";

export function registerArticlesCommand(program: Command): void {
  program
    .command("articles")
    .description("List a service's articles, or show one by ID")
    .argument("<service>", "Service name (devto, hashnode)")
    .argument("[id]", "Article ID")
    .action(async (service: string, id: string | undefined) => {
      const kind = service.toLowerCase();
      if (!isServiceKind(kind)) {
        printError(`Unknown service: ${service}`);
        process.exitCode = 1;
        return;
      }

      const spinner = ora(`Fetching ${serviceName(kind)} articles...`).start();

      try {
        const config = resolveConfig({ services: kind });
        const connector = createConnectors(config).find((c) => c.kind === kind);
        if (!connector) {
          throw new ConfigurationError(`${serviceName(kind)} is not configured`);
        }

        if (id === undefined) {
          const articles = await connector.listArticles();
          spinner.stop();
          displayArticlesTable(articles);
          return;
        }

        const article = await connector.getArticle(id);
        spinner.stop();
        if (article === null) {
          printError(`Article ${id} not found on ${serviceName(kind)}`);
          process.exitCode = 1;
          return;
        }
        displayArticle(article);
      } catch (error) {
        spinner.fail(`Failed: ${describeError(error)}`);
        process.exitCode = 1;
      }
    });
}

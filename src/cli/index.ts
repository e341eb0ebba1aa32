#!/usr/bin/env node

/**
 * crosspost CLI
 *
 * Mirrors a directory of markdown articles onto dev.to and Hashnode.
 */

import { Command } from "commander";

import { registerArticlesCommand } from "./commands/articles.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerSyncCommand } from "./commands/sync.js";
import { registerValidateCommand } from "./commands/validate.js";

const program = new Command();

program
  .name("crosspost")
  .description("Keep dev.to and Hashnode in step with a folder of markdown")
  .version("0.1.0");

registerSyncCommand(program);
registerStatusCommand(program);
registerValidateCommand(program);
registerArticlesCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();

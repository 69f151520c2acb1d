#!/usr/bin/env node

/**
 * Directory Mirror CLI
 *
 * Keeps a local PostgreSQL mirror of a SCIM identity directory.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerServeCommand } from "./commands/serve.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("directory-mirror")
  .description("Mirror a SCIM identity directory into PostgreSQL")
  .version("0.1.0");

registerDbCommand(program);
registerSyncCommand(program);
registerServeCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();

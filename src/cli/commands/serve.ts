import { startServer } from "../../server/index.js";

import type { Command } from "commander";

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Start the REST API together with the sync scheduler")
    .action(async () => {
      await startServer();
    });
}

import ora from "ora";

import { loadConfig } from "../../config.js";
import { createAppContext } from "../../context.js";
import { db, closeConnection } from "../../db/connection.js";
import { syncLogger } from "../../logger.js";
import { describeError } from "../../services/sync/errors.js";
import { displayRunReport, exitCodeFor } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Sync Commands
// ============================================================================

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Reconcile the local mirror with the directory")
    .addHelpText(
      "after",
      `
Stages run in order: users, groups, memberships by user, memberships by group.
A failing stage is reported and the remaining stages still run.
`
    );

  // sync run
  sync
    .command("run")
    .description("Run one reconciliation pass and print the per-stage report")
    .action(async () => {
      const spinner = ora("Reconciling directory...").start();

      try {
        const context = createAppContext(loadConfig(), db);
        const report = await context.orchestrator.runOnce();

        if (exitCodeFor(report) === 0) {
          spinner.succeed("Reconciliation finished");
        } else {
          spinner.warn("Reconciliation finished with failed stages");
        }
        displayRunReport(report);
        process.exitCode = exitCodeFor(report);
      } catch (error) {
        spinner.fail(`Failed: ${describeError(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // sync watch
  sync
    .command("watch")
    .description("Reconcile on a fixed interval until interrupted")
    .option("-i, --interval <ms>", "Interval between passes in milliseconds")
    .action(async (options: { interval?: string }) => {
      try {
        const config = loadConfig();
        const intervalMs =
          options.interval === undefined
            ? config.sync.intervalMs
            : Number.parseInt(options.interval, 10);

        if (!Number.isInteger(intervalMs) || intervalMs < 1000) {
          throw new Error("--interval must be an integer of at least 1000");
        }

        const context = createAppContext(config, db);
        context.scheduler.start(intervalMs, { runImmediately: true });

        await new Promise<void>((resolve) => {
          process.once("SIGINT", () => resolve());
          process.once("SIGTERM", () => resolve());
        });

        syncLogger.info("Stopping after the pass in progress");
        await context.scheduler.stop();
      } catch (error) {
        console.error(`Error: ${describeError(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}

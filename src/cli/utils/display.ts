/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { StageResult, SyncRunReport } from "../../services/sync/types.js";

/**
 * One table row per stage: stage, status, then the counters
 */
export function stageRow(result: StageResult): string[] {
  const { stats } = result;
  return [
    result.stage,
    result.status,
    String(stats.fetched),
    String(stats.inserted),
    String(stats.updated),
    String(stats.deleted),
    String(stats.unchanged),
    String(stats.skipped),
    String(stats.failed),
  ];
}

function colorStatus(result: StageResult): string {
  if (result.status === "failed") return chalk.red("failed");
  return result.snapshotDegraded
    ? chalk.yellow("succeeded*")
    : chalk.green("succeeded");
}

/**
 * Display a reconciliation report as a per-stage table with totals
 */
export function displayRunReport(report: SyncRunReport): void {
  const table = new CliTable3({
    head: [
      "Stage",
      "Status",
      "Fetched",
      "Inserted",
      "Updated",
      "Deleted",
      "Unchanged",
      "Skipped",
      "Failed",
    ].map((header) => chalk.cyan(header)),
  });

  for (const result of report.stages) {
    const [stage = "", , ...counters] = stageRow(result);
    table.push([stage, colorStatus(result), ...counters]);
  }

  const { totals } = report;
  table.push([
    chalk.bold("TOTAL"),
    "",
    String(totals.fetched),
    String(totals.inserted),
    String(totals.updated),
    String(totals.deleted),
    String(totals.unchanged),
    String(totals.skipped),
    String(totals.failed),
  ]);

  console.log(table.toString());

  for (const result of report.stages) {
    if (result.error !== undefined) {
      console.log(chalk.red(`  ${result.stage}: ${result.error}`));
    }
    if (result.snapshotDegraded) {
      console.log(
        chalk.yellow(
          `  ${result.stage}: local snapshot unavailable, nothing was deleted`
        )
      );
    }
  }
}

/**
 * Exit code for a finished pass: 0 when every stage succeeded
 */
export function exitCodeFor(report: SyncRunReport): number {
  return report.stages.some((result) => result.status === "failed") ? 1 : 0;
}

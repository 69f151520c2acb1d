import { syncLogger } from "../../logger.js";
import { describeError } from "./errors.js";

import type { SyncRunReport } from "./types.js";

export interface SyncRunner {
  runOnce(): Promise<SyncRunReport>;
}

export interface SchedulerStatus {
  running: boolean;
  queued: boolean;
  lastReport: SyncRunReport | null;
}

/**
 * Fixed-interval trigger that never runs two passes at once.
 *
 * A trigger that arrives while a pass is running queues exactly one follow-up
 * pass; any further triggers before that follow-up starts share it.
 */
export class SyncScheduler {
  private current: Promise<SyncRunReport> | null = null;
  private queued: Promise<SyncRunReport> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private lastReport: SyncRunReport | null = null;

  constructor(private readonly runner: SyncRunner) {}

  status(): SchedulerStatus {
    return {
      running: this.current !== null,
      queued: this.queued !== null,
      lastReport: this.lastReport,
    };
  }

  /**
   * Request a pass. Resolves with the report of the pass that serves this
   * request: the one started now, or the single queued follow-up.
   */
  trigger(): Promise<SyncRunReport> {
    if (this.current === null) {
      return this.startRun();
    }

    if (this.queued === null) {
      syncLogger.info("Pass already running; queueing one follow-up pass");
      const settled = () => {
        this.queued = null;
        return this.startRun();
      };
      // The running pass reports its own failure to its own callers
      this.queued = this.current.then(settled, settled);
    } else {
      syncLogger.debug("Follow-up pass already queued; coalescing trigger");
    }
    return this.queued;
  }

  start(intervalMs: number, options: { runImmediately?: boolean } = {}): void {
    if (this.timer !== null) return;

    syncLogger.info({ intervalMs }, "Sync scheduler started");
    this.timer = setInterval(() => {
      this.tick();
    }, intervalMs);

    if (options.runImmediately === true) {
      this.tick();
    }
  }

  /**
   * Stop the timer and wait for the pass in progress, if any
   */
  async stop(): Promise<void> {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
      syncLogger.info("Sync scheduler stopped");
    }
    await (this.queued ?? this.current);
  }

  private tick(): void {
    this.trigger().catch((error: unknown) => {
      syncLogger.error(
        { error: describeError(error) },
        "Scheduled reconciliation failed"
      );
    });
  }

  private startRun(): Promise<SyncRunReport> {
    const run = this.runner
      .runOnce()
      .then((report) => {
        this.lastReport = report;
        return report;
      })
      .finally(() => {
        this.current = null;
      });
    this.current = run;
    return run;
  }
}

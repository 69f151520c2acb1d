/**
 * Apply Engine
 *
 * Executes a diff inside one transaction per stage: inserts, then updates,
 * then deletes. Every record runs in its own savepoint, so a rejected record
 * is counted and skipped while the rest of the batch still commits.
 */

import { syncLogger } from "../../logger.js";
import { ApplyFailureError, describeError } from "./errors.js";

import type { DiffResult } from "./diff.js";
import type { MirrorStore, MirrorTransaction } from "./store.js";
import type {
  ChangeAction,
  ChangeRecord,
  EntityDescriptor,
} from "./types.js";

export type RecordOutcome =
  | { ok: true; change: ChangeRecord }
  | { ok: false; entityId: string; action: ChangeAction; reason: string };

export interface ApplyStats {
  inserted: number;
  updated: number;
  deleted: number;
  failed: number;
}

export interface ApplyResult {
  stats: ApplyStats;
  changes: ChangeRecord[];
  failures: Extract<RecordOutcome, { ok: false }>[];
}

interface PlannedOperation {
  entityId: string;
  action: ChangeAction;
  changedFields?: string[];
  run: (tx: MirrorTransaction) => Promise<void>;
}

function plan<T>(
  descriptor: EntityDescriptor<T>,
  result: DiffResult<T>
): PlannedOperation[] {
  return [
    ...result.toInsert.map((record) => ({
      entityId: descriptor.keyOf(record),
      action: "INSERTED" as const,
      run: (tx: MirrorTransaction) => descriptor.upsert(tx, record),
    })),
    ...result.toUpdate.map((update) => ({
      entityId: update.id,
      action: "UPDATED" as const,
      changedFields: update.changedFields,
      run: (tx: MirrorTransaction) => descriptor.upsert(tx, update.record),
    })),
    ...result.toDelete.map((record) => ({
      entityId: descriptor.keyOf(record),
      action: "DELETED" as const,
      run: (tx: MirrorTransaction) => descriptor.remove(tx, record),
    })),
  ];
}

/**
 * Reduce per-record outcomes into counters, after the loop
 */
export function summarize(outcomes: RecordOutcome[]): ApplyResult {
  const result: ApplyResult = {
    stats: { inserted: 0, updated: 0, deleted: 0, failed: 0 },
    changes: [],
    failures: [],
  };

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      result.stats.failed++;
      result.failures.push(outcome);
      continue;
    }

    result.changes.push(outcome.change);
    switch (outcome.change.action) {
      case "INSERTED":
        result.stats.inserted++;
        break;
      case "UPDATED":
        result.stats.updated++;
        break;
      case "DELETED":
        result.stats.deleted++;
        break;
    }
  }

  return result;
}

export async function apply<T>(
  descriptor: EntityDescriptor<T>,
  result: DiffResult<T>,
  store: MirrorStore,
  now: () => Date = () => new Date()
): Promise<ApplyResult> {
  const operations = plan(descriptor, result);
  if (operations.length === 0) {
    return summarize([]);
  }

  const outcomes = await store.transaction(async (tx) => {
    const collected: RecordOutcome[] = [];

    for (const operation of operations) {
      try {
        await tx.savepoint(() => operation.run(tx));
        collected.push({
          ok: true,
          change: {
            entityId: operation.entityId,
            action: operation.action,
            ...(operation.changedFields === undefined
              ? {}
              : { changedFields: operation.changedFields }),
            timestamp: now().toISOString(),
          },
        });
      } catch (cause) {
        const error = new ApplyFailureError(operation.entityId, cause);
        syncLogger.error(
          {
            stage: descriptor.stage,
            entityId: operation.entityId,
            action: operation.action,
            error: describeError(cause),
          },
          "Failed to apply record; continuing with the batch"
        );
        collected.push({
          ok: false,
          entityId: operation.entityId,
          action: operation.action,
          reason: error.message,
        });
      }
    }

    return collected;
  });

  return summarize(outcomes);
}

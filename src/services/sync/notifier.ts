/**
 * Change Notifier
 *
 * Holds the latest result per entity type until a caller clears it.
 * Node runs every publish/consume/clear to completion before the next one,
 * and the orchestrator is the only writer.
 */

import { hasChanges, type EntityType, type StageResult } from "./types.js";

export type SyncNotification = {
  hasChanges: boolean;
} & Partial<Record<EntityType, StageResult>>;

export class ChangeNotifier {
  private results = new Map<EntityType, StageResult>();
  private changed = false;

  /**
   * Replace the latest result for the entity type. The change flag is set when
   * the result inserted, updated or deleted anything.
   */
  publish(entityType: EntityType, result: StageResult): void {
    this.results.set(entityType, result);
    if (hasChanges(result.stats)) {
      this.changed = true;
    }
  }

  /**
   * Current aggregate. Per-entity results are only included while there are
   * changes to report; callers get copies of the stored results.
   */
  consume(): SyncNotification {
    const notification: SyncNotification = { hasChanges: this.changed };
    if (!this.changed) {
      return notification;
    }

    for (const [entityType, result] of this.results) {
      notification[entityType] = { ...result, changes: [...result.changes] };
    }
    return notification;
  }

  clear(): void {
    this.results = new Map();
    this.changed = false;
  }
}

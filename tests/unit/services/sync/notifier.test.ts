import { describe, it, expect } from "vitest";

import { ChangeNotifier } from "../../../../src/services/sync/notifier.js";
import { emptyStats } from "../../../../src/services/sync/types.js";

import type {
  EntityType,
  StageResult,
  SyncStage,
} from "../../../../src/services/sync/types.js";

function result(
  stage: SyncStage,
  entityType: EntityType,
  inserted: number
): StageResult {
  return {
    stage,
    entityType,
    status: "succeeded",
    stats: { ...emptyStats(), fetched: inserted, inserted },
    changes: [],
    snapshotDegraded: false,
    startedAt: "2024-06-01T12:00:00.000Z",
    finishedAt: "2024-06-01T12:00:01.000Z",
  };
}

describe("services/sync/notifier", () => {
  it("should report no changes initially", () => {
    expect(new ChangeNotifier().consume()).toEqual({ hasChanges: false });
  });

  it("should expose the latest result per entity type", () => {
    const notifier = new ChangeNotifier();
    const users = result("SYNC_USERS", "users", 2);
    const groups = result("SYNC_GROUPS", "groups", 1);

    notifier.publish("users", result("SYNC_USERS", "users", 5));
    notifier.publish("users", users);
    notifier.publish("groups", groups);

    expect(notifier.consume()).toEqual({ hasChanges: true, users, groups });
  });

  it("should keep the notification until it is cleared", () => {
    const notifier = new ChangeNotifier();
    notifier.publish("users", result("SYNC_USERS", "users", 1));

    expect(notifier.consume().hasChanges).toBe(true);
    expect(notifier.consume().hasChanges).toBe(true);

    notifier.clear();
    expect(notifier.consume()).toEqual({ hasChanges: false });
  });

  it("should not raise the flag for a result without changes", () => {
    const notifier = new ChangeNotifier();
    notifier.publish("groups", result("SYNC_GROUPS", "groups", 0));

    expect(notifier.consume()).toEqual({ hasChanges: false });
  });

  it("should not let a caller alter what the next consumer sees", () => {
    const notifier = new ChangeNotifier();
    const users: StageResult = {
      ...result("SYNC_USERS", "users", 1),
      changes: [
        {
          entityId: "u1",
          action: "INSERTED",
          timestamp: "2024-06-01T12:00:00.000Z",
        },
      ],
    };
    notifier.publish("users", users);

    const first = notifier.consume();
    first.users?.changes.splice(0);
    if (first.users) first.users.status = "failed";

    const second = notifier.consume();
    expect(second.users?.status).toBe("succeeded");
    expect(second.users?.changes).toEqual([
      {
        entityId: "u1",
        action: "INSERTED",
        timestamp: "2024-06-01T12:00:00.000Z",
      },
    ]);
  });
});

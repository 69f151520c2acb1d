import { syncLogger } from "../../logger.js";
import { apply } from "./apply.js";
import { groupDescriptor } from "./canonical/groups.js";
import {
  edgeKey,
  membershipsByGroupDescriptor,
  membershipsByUserDescriptor,
} from "./canonical/memberships.js";
import { userDescriptor } from "./canonical/users.js";
import { diff } from "./diff.js";
import { describeError } from "./errors.js";
import { loadSnapshot } from "./snapshot.js";
import {
  emptyStats,
  hasChanges,
  type EntityDescriptor,
  type MembershipEdge,
  type OrchestratorState,
  type RunStats,
  type StageResult,
  type SyncRunReport,
} from "./types.js";

import type { ChangeNotifier } from "./notifier.js";
import type { DirectoryReader } from "./reader.js";
import type { MirrorStore } from "./store.js";

// ============================================================================
// Types
// ============================================================================

export interface OrchestratorDeps {
  reader: DirectoryReader;
  store: MirrorStore;
  notifier: ChangeNotifier;
  now?: () => Date;
}

interface RemoteSet<T> {
  records: Map<string, T>;
  rejectedOwners: Set<string>;
  fetched: number;
  skipped: number;
}

export interface StagePlan<T> {
  /** Remote set of the stage; a fresh fetch when absent */
  collect?: () => Promise<RemoteSet<T>>;
  /** Local records kept even when the remote set lacks them */
  keep?: (local: T) => boolean;
}

/**
 * What the stages of one pass hand to the membership stages.
 *
 * The mirrored edge set is the union of the user-side and the group-side
 * view: `User.groups` may list indirect memberships that `Group.members`
 * does not. Each membership stage therefore keeps local edges the other
 * view still reports, so both stages settle on the same set.
 */
interface PassState {
  rejectedUsers: Set<string>;
  rejectedGroups: Set<string>;
  /** null until fetched, or when the fetch failed */
  userEdges: RemoteSet<MembershipEdge> | null;
  groupEdges: RemoteSet<MembershipEdge> | null;
}

// ============================================================================
// Sync Orchestrator
// ============================================================================

/**
 * Runs the four reconciliation stages in order. Each stage fetches, diffs and
 * applies on its own; a failing stage is reported and the next one still runs.
 */
export class SyncOrchestrator {
  private currentState: OrchestratorState = "IDLE";
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  get state(): OrchestratorState {
    return this.currentState;
  }

  /**
   * One full pass. Never rejects: every stage converts its failure into a
   * failed StageResult.
   */
  async runOnce(): Promise<SyncRunReport> {
    const startedAt = this.now().toISOString();
    syncLogger.info("Starting directory reconciliation");

    const pass: PassState = {
      rejectedUsers: new Set(),
      rejectedGroups: new Set(),
      userEdges: null,
      groupEdges: null,
    };

    const stages = [
      () =>
        this.runStage(userDescriptor, {
          collect: () => this.collectInto(userDescriptor, pass.rejectedUsers),
        }),
      () =>
        this.runStage(groupDescriptor, {
          collect: () =>
            this.collectInto(groupDescriptor, pass.rejectedGroups),
        }),
      () =>
        this.runStage(
          membershipsByUserDescriptor,
          this.membershipsByUserPlan(pass)
        ),
      () =>
        this.runStage(
          membershipsByGroupDescriptor,
          this.membershipsByGroupPlan(pass)
        ),
    ];

    const results: StageResult[] = [];
    for (const runStage of stages) {
      const result = await runStage();
      results.push(result);

      // A quiet run must not overwrite changes nobody has consumed yet
      if (result.status === "succeeded" && hasChanges(result.stats)) {
        this.deps.notifier.publish(result.entityType, result);
      }
    }

    this.currentState = "DONE";

    const report: SyncRunReport = {
      startedAt,
      finishedAt: this.now().toISOString(),
      stages: results,
      totals: sumStats(results.map((result) => result.stats)),
    };

    syncLogger.info(
      {
        totals: report.totals,
        failedStages: results
          .filter((result) => result.status === "failed")
          .map((result) => result.stage),
      },
      "Directory reconciliation finished"
    );

    return report;
  }

  async runStage<T>(
    descriptor: EntityDescriptor<T>,
    plan: StagePlan<T> = {}
  ): Promise<StageResult> {
    const { stage, entityType } = descriptor;
    const startedAt = this.now().toISOString();
    this.currentState = stage;
    syncLogger.info({ stage }, "Stage started");

    try {
      const [remote, snapshot] = await Promise.all([
        plan.collect?.() ?? this.collect(descriptor),
        loadSnapshot(descriptor, this.deps.store),
      ]);

      const classified = diff(remote.records, snapshot.records, {
        comparableFields: descriptor.comparableFields,
        isProtected: (local) =>
          remote.rejectedOwners.has(descriptor.ownerOf(local)) ||
          plan.keep?.(local) === true,
      });

      const applied = await apply(
        descriptor,
        classified,
        this.deps.store,
        this.now
      );

      const stats: RunStats = {
        fetched: remote.fetched,
        ...applied.stats,
        unchanged: classified.unchanged,
        skipped: remote.skipped,
      };

      syncLogger.info({ stage, ...stats }, "Stage completed");

      return {
        stage,
        entityType,
        status: "succeeded",
        stats,
        changes: applied.changes,
        snapshotDegraded: snapshot.degraded,
        startedAt,
        finishedAt: this.now().toISOString(),
      };
    } catch (error) {
      syncLogger.error(
        { stage, error: describeError(error) },
        "Stage failed; continuing with the next stage"
      );

      return {
        stage,
        entityType,
        status: "failed",
        stats: emptyStats(),
        changes: [],
        snapshotDegraded: false,
        error: describeError(error),
        startedAt,
        finishedAt: this.now().toISOString(),
      };
    }
  }

  private async collectInto<T>(
    descriptor: EntityDescriptor<T>,
    rejected: Set<string>
  ): Promise<RemoteSet<T>> {
    const remote = await this.collect(descriptor);
    for (const ownerId of remote.rejectedOwners) {
      rejected.add(ownerId);
    }
    return remote;
  }

  /**
   * Fetches both edge views. Without the group-side view the stage only
   * inserts, since it cannot tell which missing edges the groups still list.
   */
  private membershipsByUserPlan(
    pass: PassState
  ): StagePlan<MembershipEdge> {
    return {
      collect: async () => {
        const [byUser, byGroup] = await Promise.allSettled([
          this.collect(membershipsByUserDescriptor),
          this.collect(membershipsByGroupDescriptor),
        ]);

        if (byGroup.status === "fulfilled") {
          pass.groupEdges = withoutRejectedEdges(byGroup.value, pass);
        } else {
          syncLogger.warn(
            { error: describeError(byGroup.reason) },
            "Group-side memberships unavailable; no membership will be deleted by user"
          );
        }

        if (byUser.status === "rejected") {
          throw byUser.reason;
        }
        pass.userEdges = withoutRejectedEdges(byUser.value, pass);
        return pass.userEdges;
      },
      keep: (edge) => keepEdge(edge, pass, pass.groupEdges),
    };
  }

  /**
   * Reuses the group-side view fetched by the previous stage
   */
  private membershipsByGroupPlan(
    pass: PassState
  ): StagePlan<MembershipEdge> {
    return {
      collect: async () =>
        pass.groupEdges ??
        withoutRejectedEdges(
          await this.collect(membershipsByGroupDescriptor),
          pass
        ),
      keep: (edge) => keepEdge(edge, pass, pass.userEdges),
    };
  }

  /**
   * Drain the directory for one entity type. Later duplicates replace
   * earlier ones; rejected records are counted and remembered by owner.
   */
  private async collect<T>(
    descriptor: EntityDescriptor<T>
  ): Promise<RemoteSet<T>> {
    const remote: RemoteSet<T> = {
      records: new Map(),
      rejectedOwners: new Set(),
      fetched: 0,
      skipped: 0,
    };

    for await (const item of this.deps.reader.fetchAll(descriptor)) {
      remote.fetched++;

      if (!item.ok) {
        remote.skipped++;
        if (item.ownerId !== null) {
          remote.rejectedOwners.add(item.ownerId);
        }
        syncLogger.debug(
          { stage: descriptor.stage, ownerId: item.ownerId, reason: item.reason },
          "Skipping invalid directory record"
        );
        continue;
      }

      remote.records.set(descriptor.keyOf(item.value), item.value);
    }

    return remote;
  }
}

function isRejectedEdge(edge: MembershipEdge, pass: PassState): boolean {
  return (
    pass.rejectedUsers.has(edge.userId) || pass.rejectedGroups.has(edge.groupId)
  );
}

/**
 * Edges of users or groups rejected earlier in the pass are not mirrored;
 * they count as skipped.
 */
function withoutRejectedEdges(
  remote: RemoteSet<MembershipEdge>,
  pass: PassState
): RemoteSet<MembershipEdge> {
  const records = new Map<string, MembershipEdge>();
  let excluded = 0;
  for (const [key, edge] of remote.records) {
    if (isRejectedEdge(edge, pass)) {
      excluded++;
      continue;
    }
    records.set(key, edge);
  }
  return { ...remote, records, skipped: remote.skipped + excluded };
}

/**
 * A local edge survives when its owner was rejected, when the other view is
 * unknown, or when the other view still lists it.
 */
function keepEdge(
  edge: MembershipEdge,
  pass: PassState,
  otherView: RemoteSet<MembershipEdge> | null
): boolean {
  return (
    isRejectedEdge(edge, pass) ||
    otherView === null ||
    otherView.records.has(edgeKey(edge))
  );
}

export function sumStats(all: RunStats[]): RunStats {
  const total = emptyStats();
  for (const stats of all) {
    total.fetched += stats.fetched;
    total.inserted += stats.inserted;
    total.updated += stats.updated;
    total.deleted += stats.deleted;
    total.unchanged += stats.unchanged;
    total.skipped += stats.skipped;
    total.failed += stats.failed;
  }
  return total;
}

/**
 * Canonical types shared by the reconciliation stages
 */

import type { MirrorStore, MirrorTransaction } from "./store.js";
import type { ScimResourceType } from "../../types/index.js";

// ============================================================================
// Canonical entities
// ============================================================================

export type UserStatus = "ACTIVE" | "INACTIVE";

export interface DirectoryUser {
  id: string;
  loginName: string;
  email: string | null;
  lastName: string;
  firstName: string | null;
  userType: string;
  status: UserStatus;
  /** Calendar day, YYYY-MM-DD */
  validFrom: string | null;
  /** Calendar day, YYYY-MM-DD */
  validTo: string | null;
  company: string | null;
  country: string | null;
  city: string | null;
  /** ISO-8601 instant; informational, never compared */
  directoryLastModified: string | null;
}

export interface DirectoryGroup {
  id: string;
  name: string | null;
  displayName: string | null;
  description: string | null;
  directoryLastModified: string | null;
}

export interface MembershipEdge {
  userId: string;
  groupId: string;
}

/**
 * A mirrored row: the last-synced values plus local bookkeeping
 */
export type LocalRecord<T> = T & {
  createdAt: string | null;
  updatedAt: string | null;
};

// ============================================================================
// Normalization outcome
// ============================================================================

export type Normalized<T> =
  | { ok: true; value: T }
  | {
      ok: false;
      /**
       * Id of the directory record the rejected value belongs to, when it
       * has one. Local records owned by it are left untouched.
       */
      ownerId: string | null;
      reason: string;
    };

// ============================================================================
// Stages and entity types
// ============================================================================

export const SYNC_STAGES = [
  "SYNC_USERS",
  "SYNC_GROUPS",
  "SYNC_MEMBERSHIPS_BY_USER",
  "SYNC_MEMBERSHIPS_BY_GROUP",
] as const;

export type SyncStage = (typeof SYNC_STAGES)[number];

export type OrchestratorState = "IDLE" | SyncStage | "DONE";

/** Keys of the notification aggregate, one per stage */
export type EntityType =
  | "users"
  | "groups"
  | "userGroupAssignments"
  | "groupMembers";

// ============================================================================
// Entity descriptor
// ============================================================================

/**
 * Everything the generic fetch/diff/apply pipeline needs to know about one
 * entity type.
 */
export interface EntityDescriptor<T> {
  stage: SyncStage;
  entityType: EntityType;
  resource: ScimResourceType;
  /** Fields whose inequality makes a record UPDATED, in reporting order */
  comparableFields: readonly (keyof T & string)[];
  keyOf(record: T): string;
  /** Directory record a value belongs to (itself, or an edge's owner) */
  ownerOf(record: T): string;
  normalize(resource: unknown): Normalized<T>[];
  load(store: MirrorStore): Promise<LocalRecord<T>[]>;
  upsert(tx: MirrorTransaction, record: T): Promise<void>;
  remove(tx: MirrorTransaction, record: T): Promise<void>;
}

// ============================================================================
// Results
// ============================================================================

export type ChangeAction = "INSERTED" | "UPDATED" | "DELETED";

export interface ChangeRecord {
  entityId: string;
  action: ChangeAction;
  /** Only on UPDATED */
  changedFields?: string[];
  timestamp: string;
}

export interface RunStats {
  fetched: number;
  inserted: number;
  updated: number;
  deleted: number;
  unchanged: number;
  skipped: number;
  failed: number;
}

export interface StageResult {
  stage: SyncStage;
  entityType: EntityType;
  status: "succeeded" | "failed";
  stats: RunStats;
  changes: ChangeRecord[];
  snapshotDegraded: boolean;
  error?: string;
  startedAt: string;
  finishedAt: string;
}

export interface SyncRunReport {
  startedAt: string;
  finishedAt: string;
  stages: StageResult[];
  totals: RunStats;
}

export function emptyStats(): RunStats {
  return {
    fetched: 0,
    inserted: 0,
    updated: 0,
    deleted: 0,
    unchanged: 0,
    skipped: 0,
    failed: 0,
  };
}

export function hasChanges(stats: RunStats): boolean {
  return stats.inserted + stats.updated + stats.deleted > 0;
}

/**
 * Storage collaborator consumed by the reconciliation engine.
 *
 * The PostgreSQL implementation lives in db/mirror-store.ts; tests use an
 * in-memory one.
 */

import type {
  DirectoryGroup,
  DirectoryUser,
  LocalRecord,
  MembershipEdge,
} from "./types.js";

export type EdgeOwner = { userId: string } | { groupId: string };

export interface MirrorTransaction {
  /**
   * Run one record's writes so that a failure undoes only them and leaves
   * the surrounding transaction usable.
   */
  savepoint<T>(work: () => Promise<T>): Promise<T>;
  upsertUser(user: DirectoryUser): Promise<void>;
  upsertGroup(group: DirectoryGroup): Promise<void>;
  deleteUser(id: string): Promise<void>;
  deleteGroup(id: string): Promise<void>;
  upsertEdge(edge: MembershipEdge): Promise<void>;
  deleteEdge(edge: MembershipEdge): Promise<void>;
  deleteAllEdgesFor(owner: EdgeOwner): Promise<number>;
}

export interface MirrorStore {
  loadUsers(): Promise<LocalRecord<DirectoryUser>[]>;
  loadGroups(): Promise<LocalRecord<DirectoryGroup>[]>;
  loadMemberships(): Promise<LocalRecord<MembershipEdge>[]>;
  transaction<T>(work: (tx: MirrorTransaction) => Promise<T>): Promise<T>;
}

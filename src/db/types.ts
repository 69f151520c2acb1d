import type { ColumnType, Insertable, Selectable } from "kysely";

import type { UserStatus } from "../services/sync/types.js";

// ============================================================================
// Column helpers
// ============================================================================

/** DATE columns come back as YYYY-MM-DD strings (see connection.ts) */
type DayColumn = string | null;

/** timestamptz written as ISO strings, read back as Date */
type InstantColumn = ColumnType<Date | null, string | null, string | null>;

/** Bookkeeping timestamps maintained by the database */
type AuditColumn = ColumnType<Date, never, Date>;

// ============================================================================
// Tables (matching postgres-schema.sql)
// ============================================================================

export interface UsersTable {
  id: string;
  login_name: string;
  email: string | null;
  last_name: string;
  first_name: string | null;
  user_type: string;
  status: UserStatus;
  valid_from: DayColumn;
  valid_to: DayColumn;
  company: string | null;
  country: string | null;
  city: string | null;
  directory_last_modified: InstantColumn;
  created_at: AuditColumn;
  updated_at: AuditColumn;
}

export interface GroupsTable {
  id: string;
  name: string | null;
  display_name: string | null;
  description: string | null;
  directory_last_modified: InstantColumn;
  created_at: AuditColumn;
  updated_at: AuditColumn;
}

export interface GroupMembersTable {
  group_id: string;
  user_id: string;
  created_at: AuditColumn;
  updated_at: AuditColumn;
}

export interface Database {
  users: UsersTable;
  groups: GroupsTable;
  group_members: GroupMembersTable;
}

export type UserRow = Selectable<UsersTable>;
export type NewUserRow = Insertable<UsersTable>;
export type GroupRow = Selectable<GroupsTable>;
export type NewGroupRow = Insertable<GroupsTable>;
export type GroupMemberRow = Selectable<GroupMembersTable>;

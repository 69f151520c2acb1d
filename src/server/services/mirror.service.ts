/**
 * Mirror Service - read access to the mirrored users, groups and memberships
 */

import { type Kysely } from "kysely";

import { groupFromRow, userFromRow } from "../../db/mirror-store.js";
import { describeError } from "../../services/sync/errors.js";
import {
  createPaginationMeta,
  parseLimit,
  validateCursor,
  type PaginatedResult,
} from "../../utils/pagination.js";
import { DatabaseError } from "../plugins/error-handler.js";

import type { Database, GroupRow, UserRow } from "../../db/types.js";
import type { UserStatus } from "../../services/sync/types.js";
import type { GroupDetailDto, GroupDto, UserDto } from "../../types/api.js";

// ============================================================================
// Query Options
// ============================================================================

export interface ListUsersOptions {
  status?: UserStatus;
  userType?: string;
  email?: string;
  country?: string;
  search?: string;
  limit?: number;
  cursor?: string;
}

export interface ListGroupsOptions {
  search?: string;
  limit?: number;
  cursor?: string;
}

export interface ListMembersOptions {
  limit?: number;
  cursor?: string;
}

/**
 * Read side of the mirror as the HTTP routes see it
 */
export interface MirrorReader {
  listUsers(options?: ListUsersOptions): Promise<PaginatedResult<UserDto>>;
  getUser(id: string): Promise<UserDto | null>;
  listGroupsForUser(userId: string): Promise<GroupDto[]>;
  listGroups(options?: ListGroupsOptions): Promise<PaginatedResult<GroupDto>>;
  getGroup(id: string): Promise<GroupDetailDto | null>;
  /** The subset of `ids` naming mirrored groups */
  findGroupIds(ids: string[]): Promise<string[]>;
  listGroupMembers(
    groupId: string,
    options?: ListMembersOptions
  ): Promise<PaginatedResult<UserDto>>;
}

// ============================================================================
// Mapping
// ============================================================================

export function toUserDto(row: UserRow): UserDto {
  const { createdAt: _createdAt, ...user } = userFromRow(row);
  return user;
}

export function toGroupDto(row: GroupRow): GroupDto {
  const { createdAt: _createdAt, ...group } = groupFromRow(row);
  return group;
}

/**
 * Escape LIKE wildcards so user input matches literally
 */
export function likePattern(search: string): string {
  return `%${search.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

async function withDatabase<T>(operation: string, work: () => Promise<T>) {
  try {
    return await work();
  } catch (error) {
    throw new DatabaseError(`${operation} failed: ${describeError(error)}`);
  }
}

// ============================================================================
// Kysely implementation
// ============================================================================

export class KyselyMirrorReader implements MirrorReader {
  constructor(private readonly db: Kysely<Database>) {}

  listUsers(options: ListUsersOptions = {}): Promise<PaginatedResult<UserDto>> {
    return withDatabase("Listing users", async () => {
      const limit = parseLimit(options.limit, 50, 500);
      const cursor = validateCursor(options.cursor);

      let query = this.db.selectFrom("users").selectAll();

      if (options.status !== undefined) {
        query = query.where("status", "=", options.status);
      }
      if (options.userType !== undefined) {
        query = query.where("user_type", "=", options.userType);
      }
      if (options.country !== undefined) {
        query = query.where("country", "=", options.country);
      }
      if (options.email !== undefined) {
        const email = options.email.toLowerCase();
        query = query.where((eb) => eb(eb.fn<string>("lower", ["email"]), "=", email));
      }
      if (options.search !== undefined && options.search.trim() !== "") {
        const pattern = likePattern(options.search.trim());
        query = query.where((eb) =>
          eb.or([
            eb("login_name", "ilike", pattern),
            eb("email", "ilike", pattern),
            eb("first_name", "ilike", pattern),
            eb("last_name", "ilike", pattern),
          ])
        );
      }
      if (cursor) {
        query = query.where((eb) =>
          eb.or([
            eb("login_name", ">", cursor.sortValue),
            eb.and([
              eb("login_name", "=", cursor.sortValue),
              eb("id", ">", cursor.id),
            ]),
          ])
        );
      }

      const rows = await query
        .orderBy("login_name")
        .orderBy("id")
        .limit(limit + 1)
        .execute();

      const hasMore = rows.length > limit;
      const items = rows.slice(0, limit).map(toUserDto);

      return {
        items,
        pagination: createPaginationMeta(items, limit, "loginName", hasMore),
      };
    });
  }

  getUser(id: string): Promise<UserDto | null> {
    return withDatabase("Loading user", async () => {
      const row = await this.db
        .selectFrom("users")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst();
      return row ? toUserDto(row) : null;
    });
  }

  listGroupsForUser(userId: string): Promise<GroupDto[]> {
    return withDatabase("Listing user groups", async () => {
      const rows = await this.db
        .selectFrom("groups")
        .innerJoin("group_members", "group_members.group_id", "groups.id")
        .selectAll("groups")
        .where("group_members.user_id", "=", userId)
        .orderBy("groups.id")
        .execute();
      return rows.map(toGroupDto);
    });
  }

  listGroups(
    options: ListGroupsOptions = {}
  ): Promise<PaginatedResult<GroupDto>> {
    return withDatabase("Listing groups", async () => {
      const limit = parseLimit(options.limit, 50, 500);
      const cursor = validateCursor(options.cursor);

      let query = this.db.selectFrom("groups").selectAll();

      if (options.search !== undefined && options.search.trim() !== "") {
        const pattern = likePattern(options.search.trim());
        query = query.where((eb) =>
          eb.or([
            eb("name", "ilike", pattern),
            eb("display_name", "ilike", pattern),
          ])
        );
      }
      if (cursor) {
        query = query.where("id", ">", cursor.id);
      }

      const rows = await query
        .orderBy("id")
        .limit(limit + 1)
        .execute();

      const hasMore = rows.length > limit;
      const items = rows.slice(0, limit).map(toGroupDto);

      return {
        items,
        pagination: createPaginationMeta(items, limit, "id", hasMore),
      };
    });
  }

  getGroup(id: string): Promise<GroupDetailDto | null> {
    return withDatabase("Loading group", async () => {
      const row = await this.db
        .selectFrom("groups")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst();
      if (!row) return null;

      // Only edges to mirrored users count, as in listGroupMembers
      const count = await this.db
        .selectFrom("group_members")
        .innerJoin("users", "users.id", "group_members.user_id")
        .select((eb) => eb.fn.countAll<string>().as("count"))
        .where("group_members.group_id", "=", id)
        .executeTakeFirstOrThrow();

      return { ...toGroupDto(row), memberCount: Number(count.count) };
    });
  }

  findGroupIds(ids: string[]): Promise<string[]> {
    if (ids.length === 0) return Promise.resolve([]);
    return withDatabase("Looking up groups", async () => {
      const rows = await this.db
        .selectFrom("groups")
        .select("id")
        .where("id", "in", ids)
        .execute();
      return rows.map((row) => row.id);
    });
  }

  listGroupMembers(
    groupId: string,
    options: ListMembersOptions = {}
  ): Promise<PaginatedResult<UserDto>> {
    return withDatabase("Listing group members", async () => {
      const limit = parseLimit(options.limit, 50, 500);
      const cursor = validateCursor(options.cursor);

      let query = this.db
        .selectFrom("users")
        .innerJoin("group_members", "group_members.user_id", "users.id")
        .selectAll("users")
        .where("group_members.group_id", "=", groupId);

      if (cursor) {
        query = query.where("users.id", ">", cursor.id);
      }

      const rows = await query
        .orderBy("users.id")
        .limit(limit + 1)
        .execute();

      const hasMore = rows.length > limit;
      const items = rows.slice(0, limit).map(toUserDto);

      return {
        items,
        pagination: createPaginationMeta(items, limit, "id", hasMore),
      };
    });
  }
}

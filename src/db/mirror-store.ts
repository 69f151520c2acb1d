/**
 * PostgreSQL-backed mirror store used by the reconciliation engine and the
 * membership editor.
 */

import { sql, type Kysely, type Transaction } from "kysely";

import { toDay, toInstant } from "../services/sync/canonical/values.js";

import type {
  Database,
  GroupMemberRow,
  GroupRow,
  NewGroupRow,
  NewUserRow,
  UserRow,
} from "./types.js";
import type { MembershipLookup } from "../services/sync/membership-editor.js";
import type {
  EdgeOwner,
  MirrorStore,
  MirrorTransaction,
} from "../services/sync/store.js";
import type {
  DirectoryGroup,
  DirectoryUser,
  LocalRecord,
  MembershipEdge,
} from "../services/sync/types.js";

// ============================================================================
// Row mapping
// ============================================================================

export function userFromRow(row: UserRow): LocalRecord<DirectoryUser> {
  return {
    id: row.id,
    loginName: row.login_name,
    email: row.email,
    lastName: row.last_name,
    firstName: row.first_name,
    userType: row.user_type,
    status: row.status,
    validFrom: toDay(row.valid_from),
    validTo: toDay(row.valid_to),
    company: row.company,
    country: row.country,
    city: row.city,
    directoryLastModified: toInstant(row.directory_last_modified),
    createdAt: toInstant(row.created_at),
    updatedAt: toInstant(row.updated_at),
  };
}

export function groupFromRow(row: GroupRow): LocalRecord<DirectoryGroup> {
  return {
    id: row.id,
    name: row.name,
    displayName: row.display_name,
    description: row.description,
    directoryLastModified: toInstant(row.directory_last_modified),
    createdAt: toInstant(row.created_at),
    updatedAt: toInstant(row.updated_at),
  };
}

function edgeFromRow(row: GroupMemberRow): LocalRecord<MembershipEdge> {
  return {
    groupId: row.group_id,
    userId: row.user_id,
    createdAt: toInstant(row.created_at),
    updatedAt: toInstant(row.updated_at),
  };
}

function userToRow(user: DirectoryUser): NewUserRow {
  return {
    id: user.id,
    login_name: user.loginName,
    email: user.email,
    last_name: user.lastName,
    first_name: user.firstName,
    user_type: user.userType,
    status: user.status,
    valid_from: user.validFrom,
    valid_to: user.validTo,
    company: user.company,
    country: user.country,
    city: user.city,
    directory_last_modified: user.directoryLastModified,
  };
}

function groupToRow(group: DirectoryGroup): NewGroupRow {
  return {
    id: group.id,
    name: group.name,
    display_name: group.displayName,
    description: group.description,
    directory_last_modified: group.directoryLastModified,
  };
}

// ============================================================================
// Transaction
// ============================================================================

class KyselyMirrorTransaction implements MirrorTransaction {
  private savepoints = 0;

  constructor(private readonly trx: Transaction<Database>) {}

  async savepoint<T>(work: () => Promise<T>): Promise<T> {
    this.savepoints++;
    const name = sql.id(`mirror_record_${String(this.savepoints)}`);

    await sql`SAVEPOINT ${name}`.execute(this.trx);
    try {
      const result = await work();
      await sql`RELEASE SAVEPOINT ${name}`.execute(this.trx);
      return result;
    } catch (error) {
      await sql`ROLLBACK TO SAVEPOINT ${name}`.execute(this.trx);
      throw error;
    }
  }

  async upsertUser(user: DirectoryUser): Promise<void> {
    await this.trx
      .insertInto("users")
      .values(userToRow(user))
      .onConflict((oc) =>
        oc.column("id").doUpdateSet((eb) => ({
          login_name: eb.ref("excluded.login_name"),
          email: eb.ref("excluded.email"),
          last_name: eb.ref("excluded.last_name"),
          first_name: eb.ref("excluded.first_name"),
          user_type: eb.ref("excluded.user_type"),
          status: eb.ref("excluded.status"),
          valid_from: eb.ref("excluded.valid_from"),
          valid_to: eb.ref("excluded.valid_to"),
          company: eb.ref("excluded.company"),
          country: eb.ref("excluded.country"),
          city: eb.ref("excluded.city"),
          directory_last_modified: eb.ref("excluded.directory_last_modified"),
          updated_at: sql<Date>`now()`,
        }))
      )
      .execute();
  }

  async upsertGroup(group: DirectoryGroup): Promise<void> {
    await this.trx
      .insertInto("groups")
      .values(groupToRow(group))
      .onConflict((oc) =>
        oc.column("id").doUpdateSet((eb) => ({
          name: eb.ref("excluded.name"),
          display_name: eb.ref("excluded.display_name"),
          description: eb.ref("excluded.description"),
          directory_last_modified: eb.ref("excluded.directory_last_modified"),
          updated_at: sql<Date>`now()`,
        }))
      )
      .execute();
  }

  async deleteUser(id: string): Promise<void> {
    await this.trx.deleteFrom("users").where("id", "=", id).execute();
  }

  async deleteGroup(id: string): Promise<void> {
    await this.trx.deleteFrom("groups").where("id", "=", id).execute();
  }

  async upsertEdge(edge: MembershipEdge): Promise<void> {
    await this.trx
      .insertInto("group_members")
      .values({ group_id: edge.groupId, user_id: edge.userId })
      .onConflict((oc) =>
        oc
          .columns(["group_id", "user_id"])
          .doUpdateSet({ updated_at: sql<Date>`now()` })
      )
      .execute();
  }

  async deleteEdge(edge: MembershipEdge): Promise<void> {
    await this.trx
      .deleteFrom("group_members")
      .where("group_id", "=", edge.groupId)
      .where("user_id", "=", edge.userId)
      .execute();
  }

  async deleteAllEdgesFor(owner: EdgeOwner): Promise<number> {
    const query = this.trx.deleteFrom("group_members");
    const result = await ("userId" in owner
      ? query.where("user_id", "=", owner.userId)
      : query.where("group_id", "=", owner.groupId)
    ).executeTakeFirst();
    return Number(result.numDeletedRows);
  }
}

// ============================================================================
// Store
// ============================================================================

export class KyselyMirrorStore implements MirrorStore, MembershipLookup {
  constructor(private readonly db: Kysely<Database>) {}

  async loadUsers(): Promise<LocalRecord<DirectoryUser>[]> {
    const rows = await this.db
      .selectFrom("users")
      .selectAll()
      .orderBy("id")
      .execute();
    return rows.map(userFromRow);
  }

  async loadGroups(): Promise<LocalRecord<DirectoryGroup>[]> {
    const rows = await this.db
      .selectFrom("groups")
      .selectAll()
      .orderBy("id")
      .execute();
    return rows.map(groupFromRow);
  }

  async loadMemberships(): Promise<LocalRecord<MembershipEdge>[]> {
    const rows = await this.db
      .selectFrom("group_members")
      .selectAll()
      .orderBy("group_id")
      .orderBy("user_id")
      .execute();
    return rows.map(edgeFromRow);
  }

  async memberIdsOf(groupId: string): Promise<string[]> {
    const rows = await this.db
      .selectFrom("group_members")
      .select("user_id")
      .where("group_id", "=", groupId)
      .execute();
    return rows.map((row) => row.user_id);
  }

  transaction<T>(work: (tx: MirrorTransaction) => Promise<T>): Promise<T> {
    return this.db
      .transaction()
      .execute((trx) => work(new KyselyMirrorTransaction(trx)));
  }
}

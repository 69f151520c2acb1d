import { syncLogger } from "../../logger.js";
import { DirectoryUnavailableError, describeError } from "./errors.js";

import type { MirrorStore } from "./store.js";
import type { ScimPatchOperation } from "../../types/index.js";

export interface DirectoryGroupWriter {
  patchGroup(groupId: string, operations: ScimPatchOperation[]): Promise<void>;
}

export interface MembershipLookup {
  memberIdsOf(groupId: string): Promise<string[]>;
}

export interface AddMembersResult {
  groupId: string;
  added: string[];
  alreadyMembers: string[];
}

export interface AddUserToGroupsResult {
  userId: string;
  added: string[];
  /** Groups the directory rejected; the mirror keeps their old state */
  failed: string[];
}

export interface RemoveUserFromGroupsResult {
  userId: string;
  removed: string[];
  failed: string[];
}

interface GroupEditOutcome {
  changed: string[];
  failed: string[];
}

/**
 * Membership edits issued through the local API.
 *
 * The directory is written first; the mirror follows only once the directory
 * accepted the change, so a rejected edit leaves the mirror untouched.
 */
export class MembershipEditor {
  constructor(
    private readonly directory: DirectoryGroupWriter,
    private readonly store: MirrorStore,
    private readonly lookup: MembershipLookup
  ) {}

  async addMembers(
    groupId: string,
    userIds: string[]
  ): Promise<AddMembersResult> {
    const requested = [...new Set(userIds)];

    await this.directory.patchGroup(groupId, [
      {
        op: "add",
        path: "members",
        value: requested.map((value) => ({ value })),
      },
    ]);

    const existing = new Set(await this.lookup.memberIdsOf(groupId));
    const added = requested.filter((userId) => !existing.has(userId));
    const alreadyMembers = requested.filter((userId) => existing.has(userId));

    await this.store.transaction(async (tx) => {
      for (const userId of added) {
        await tx.upsertEdge({ userId, groupId });
      }
    });

    syncLogger.info(
      { groupId, added: added.length, alreadyMembers: alreadyMembers.length },
      "Group members added"
    );

    return { groupId, added, alreadyMembers };
  }

  async removeMember(groupId: string, userId: string): Promise<void> {
    await this.directory.patchGroup(groupId, [removeOperation(userId)]);

    await this.store.transaction((tx) => tx.deleteEdge({ userId, groupId }));

    syncLogger.info({ groupId, userId }, "Group member removed");
  }

  /**
   * Add one user to several groups, one PATCH per group. A group the
   * directory rejects is reported in `failed`; the others still proceed.
   */
  async addUserToGroups(
    userId: string,
    groupIds: string[]
  ): Promise<AddUserToGroupsResult> {
    const outcome = await this.editEachGroup(
      userId,
      groupIds,
      "add",
      async (groupId) => {
        await this.directory.patchGroup(groupId, [
          { op: "add", path: "members", value: [{ value: userId }] },
        ]);
        await this.store.transaction((tx) =>
          tx.upsertEdge({ userId, groupId })
        );
      }
    );
    return { userId, added: outcome.changed, failed: outcome.failed };
  }

  /**
   * Remove one user from several groups, one PATCH per group
   */
  async removeUserFromGroups(
    userId: string,
    groupIds: string[]
  ): Promise<RemoveUserFromGroupsResult> {
    const outcome = await this.editEachGroup(
      userId,
      groupIds,
      "remove",
      async (groupId) => {
        await this.directory.patchGroup(groupId, [removeOperation(userId)]);
        await this.store.transaction((tx) =>
          tx.deleteEdge({ userId, groupId })
        );
      }
    );
    return { userId, removed: outcome.changed, failed: outcome.failed };
  }

  private async editEachGroup(
    userId: string,
    groupIds: string[],
    op: "add" | "remove",
    edit: (groupId: string) => Promise<void>
  ): Promise<GroupEditOutcome> {
    const result: GroupEditOutcome = { changed: [], failed: [] };

    for (const groupId of new Set(groupIds)) {
      try {
        await edit(groupId);
        result.changed.push(groupId);
      } catch (error) {
        if (!(error instanceof DirectoryUnavailableError)) {
          throw error;
        }
        syncLogger.warn(
          { userId, groupId, op, status: error.status, error: describeError(error) },
          "Directory rejected membership edit"
        );
        result.failed.push(groupId);
      }
    }

    syncLogger.info(
      { userId, op, changed: result.changed.length, failed: result.failed.length },
      "User group memberships edited"
    );

    return result;
  }
}

function removeOperation(userId: string): ScimPatchOperation {
  return {
    op: "remove",
    path: `members[value eq "${userId.replaceAll('"', '\\"')}"]`,
  };
}

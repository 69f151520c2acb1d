import { parseScimGroup } from "./groups.js";
import { parseScimUser } from "./users.js";
import { text } from "./values.js";

import type {
  EntityDescriptor,
  MembershipEdge,
  Normalized,
} from "../types.js";
import type { ScimMultiValue } from "../../../types/index.js";

export function edgeKey(edge: MembershipEdge): string {
  return `${edge.groupId}:${edge.userId}`;
}

function toEdges(
  refs: ScimMultiValue[] | null | undefined,
  build: (otherId: string) => MembershipEdge
): Normalized<MembershipEdge>[] {
  return (refs ?? []).map((ref): Normalized<MembershipEdge> => {
    const otherId = text(ref.value);
    if (otherId === null) {
      return { ok: false, ownerId: null, reason: "reference without value" };
    }
    return { ok: true, value: build(otherId) };
  });
}

/**
 * Edges read from a user's `groups` attribute
 */
export function edgesFromUser(resource: unknown): Normalized<MembershipEdge>[] {
  const parsed = parseScimUser(resource);
  if (!parsed.ok) {
    return [{ ok: false, ownerId: parsed.ownerId, reason: "malformed resource" }];
  }

  const userId = text(parsed.user.id);
  if (userId === null) {
    return [{ ok: false, ownerId: null, reason: "missing required field: id" }];
  }

  return toEdges(parsed.user.groups, (groupId) => ({ userId, groupId }));
}

/**
 * Edges read from a group's `members` attribute. Nested groups are not
 * memberships of a user and are left out.
 */
export function edgesFromGroup(
  resource: unknown
): Normalized<MembershipEdge>[] {
  const parsed = parseScimGroup(resource);
  if (!parsed.ok) {
    return [{ ok: false, ownerId: parsed.ownerId, reason: "malformed resource" }];
  }

  const groupId = text(parsed.group.id);
  if (groupId === null) {
    return [{ ok: false, ownerId: null, reason: "missing required field: id" }];
  }

  const userMembers = (parsed.group.members ?? []).filter(
    (member) => member.type?.toLowerCase() !== "group"
  );
  return toEdges(userMembers, (userId) => ({ userId, groupId }));
}

const edgeOperations = {
  comparableFields: [],
  keyOf: edgeKey,
  load: (store) => store.loadMemberships(),
  upsert: (tx, edge) => tx.upsertEdge(edge),
  remove: (tx, edge) => tx.deleteEdge(edge),
} satisfies Partial<EntityDescriptor<MembershipEdge>>;

export const membershipsByUserDescriptor: EntityDescriptor<MembershipEdge> = {
  ...edgeOperations,
  stage: "SYNC_MEMBERSHIPS_BY_USER",
  entityType: "userGroupAssignments",
  resource: "Users",
  ownerOf: (edge) => edge.userId,
  normalize: edgesFromUser,
};

export const membershipsByGroupDescriptor: EntityDescriptor<MembershipEdge> = {
  ...edgeOperations,
  stage: "SYNC_MEMBERSHIPS_BY_GROUP",
  entityType: "groupMembers",
  resource: "Groups",
  ownerOf: (edge) => edge.groupId,
  normalize: edgesFromGroup,
};

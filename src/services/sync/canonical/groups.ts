import { Value } from "@sinclair/typebox/value";

import {
  CUSTOM_GROUP_EXTENSION,
  ScimGroupSchema,
  type ScimGroup,
} from "../../../types/index.js";
import { idOf } from "./users.js";
import { text, toInstant } from "./values.js";

import type { DirectoryGroup, EntityDescriptor, Normalized } from "../types.js";

export function parseScimGroup(
  resource: unknown
): { ok: true; group: ScimGroup } | { ok: false; ownerId: string | null } {
  if (Value.Check(ScimGroupSchema, resource)) {
    return { ok: true, group: resource };
  }
  return { ok: false, ownerId: idOf(resource) };
}

/**
 * Convert one SCIM group. The technical name and description come from the
 * custom group extension.
 */
export function normalizeGroup(resource: unknown): Normalized<DirectoryGroup> {
  const parsed = parseScimGroup(resource);
  if (!parsed.ok) {
    return { ok: false, ownerId: parsed.ownerId, reason: "malformed resource" };
  }

  const group = parsed.group;
  const id = text(group.id);
  if (id === null) {
    return { ok: false, ownerId: null, reason: "missing required field: id" };
  }

  const extension = group[CUSTOM_GROUP_EXTENSION];

  return {
    ok: true,
    value: {
      id,
      name: text(extension?.name),
      displayName: text(group.displayName),
      description: text(extension?.description),
      directoryLastModified: toInstant(group.meta?.lastModified),
    },
  };
}

export const GROUP_COMPARABLE_FIELDS = [
  "name",
  "displayName",
  "description",
] as const satisfies readonly (keyof DirectoryGroup)[];

export const groupDescriptor: EntityDescriptor<DirectoryGroup> = {
  stage: "SYNC_GROUPS",
  entityType: "groups",
  resource: "Groups",
  comparableFields: GROUP_COMPARABLE_FIELDS,
  keyOf: (group) => group.id,
  ownerOf: (group) => group.id,
  normalize: (resource) => [normalizeGroup(resource)],
  load: (store) => store.loadGroups(),
  upsert: (tx, group) => tx.upsertGroup(group),
  async remove(tx, group) {
    await tx.deleteAllEdgesFor({ groupId: group.id });
    await tx.deleteGroup(group.id);
  },
};

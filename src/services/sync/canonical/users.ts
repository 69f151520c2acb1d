import { Value } from "@sinclair/typebox/value";

import {
  ENTERPRISE_USER_EXTENSION,
  SAP_USER_EXTENSION,
  ScimUserSchema,
  type ScimAddress,
  type ScimMultiValue,
  type ScimUser,
} from "../../../types/index.js";
import { text, toDay, toInstant } from "./values.js";

import type {
  DirectoryUser,
  EntityDescriptor,
  Normalized,
  UserStatus,
} from "../types.js";

// ============================================================================
// Parsing
// ============================================================================

/**
 * Check the raw JSON against the SCIM user shape
 */
export function parseScimUser(
  resource: unknown
): { ok: true; user: ScimUser } | { ok: false; ownerId: string | null } {
  if (Value.Check(ScimUserSchema, resource)) {
    return { ok: true, user: resource };
  }
  return { ok: false, ownerId: idOf(resource) };
}

/**
 * Best-effort id of a resource that failed the schema check
 */
export function idOf(resource: unknown): string | null {
  if (typeof resource !== "object" || resource === null) return null;
  if (!("id" in resource) || typeof resource.id !== "string") return null;
  return text(resource.id);
}

function firstEmail(emails: ScimMultiValue[] | null | undefined) {
  for (const email of emails ?? []) {
    const value = text(email.value);
    if (value !== null) return value;
  }
  return null;
}

function pickAddress(addresses: ScimAddress[] | null | undefined) {
  const list = addresses ?? [];
  const byType = (type: string) =>
    list.find((address) => address.type?.toLowerCase() === type);

  const chosen = byType("home") ?? byType("work") ?? list[0];
  return {
    country: text(chosen?.country),
    city: text(chosen?.locality),
  };
}

function resolveStatus(user: ScimUser): UserStatus {
  if (user.active !== null && user.active !== undefined) {
    return user.active ? "ACTIVE" : "INACTIVE";
  }
  const extensionStatus = text(user[SAP_USER_EXTENSION]?.status);
  return extensionStatus?.toLowerCase() === "inactive" ? "INACTIVE" : "ACTIVE";
}

// ============================================================================
// Canonical conversion
// ============================================================================

/**
 * Convert one SCIM user into the canonical user, or explain why it is
 * excluded. Core attributes win over the SAP extension's copies.
 */
export function normalizeUser(resource: unknown): Normalized<DirectoryUser> {
  const parsed = parseScimUser(resource);
  if (!parsed.ok) {
    return { ok: false, ownerId: parsed.ownerId, reason: "malformed resource" };
  }

  const user = parsed.user;
  const sap = user[SAP_USER_EXTENSION];
  const enterprise = user[ENTERPRISE_USER_EXTENSION];

  const id = text(user.id);
  const email = firstEmail(user.emails) ?? firstEmail(sap?.emails);
  const loginName = text(user.userName) ?? email;
  const lastName = text(user.name?.familyName);
  const userType = text(user.userType);

  const coreAddress = pickAddress(user.addresses);
  const address =
    coreAddress.country !== null || coreAddress.city !== null
      ? coreAddress
      : pickAddress(sap?.addresses);

  const missing: string[] = [];
  if (id === null) missing.push("id");
  if (loginName === null) missing.push("loginName");
  if (lastName === null) missing.push("lastName");
  if (userType === null) missing.push("userType");

  if (id === null || loginName === null || lastName === null || userType === null) {
    return {
      ok: false,
      ownerId: id,
      reason: `missing required field: ${missing.join(", ")}`,
    };
  }

  return {
    ok: true,
    value: {
      id,
      loginName,
      email,
      lastName,
      firstName: text(user.name?.givenName),
      userType,
      status: resolveStatus(user),
      validFrom: toDay(sap?.validFrom),
      validTo: toDay(sap?.validTo),
      company: text(enterprise?.organization),
      country: address.country,
      city: address.city,
      directoryLastModified: toInstant(user.meta?.lastModified),
    },
  };
}

// ============================================================================
// Descriptor
// ============================================================================

export const USER_COMPARABLE_FIELDS = [
  "loginName",
  "email",
  "lastName",
  "firstName",
  "userType",
  "status",
  "validFrom",
  "validTo",
  "company",
  "country",
  "city",
] as const satisfies readonly (keyof DirectoryUser)[];

export const userDescriptor: EntityDescriptor<DirectoryUser> = {
  stage: "SYNC_USERS",
  entityType: "users",
  resource: "Users",
  comparableFields: USER_COMPARABLE_FIELDS,
  keyOf: (user) => user.id,
  ownerOf: (user) => user.id,
  normalize: (resource) => [normalizeUser(resource)],
  load: (store) => store.loadUsers(),
  upsert: (tx, user) => tx.upsertUser(user),
  async remove(tx, user) {
    await tx.deleteAllEdgesFor({ userId: user.id });
    await tx.deleteUser(user.id);
  },
};

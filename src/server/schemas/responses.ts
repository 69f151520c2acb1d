/**
 * Response Schemas with examples for OpenAPI Documentation
 */

import { Type } from "@sinclair/typebox";

import {
  NullableString,
  UserStatusSchema,
  createListResponseSchema,
  createResponseSchema,
} from "./common.js";

// ============================================================================
// Mirror Schemas
// ============================================================================

export const UserSchema = Type.Object(
  {
    id: Type.String(),
    loginName: Type.String(),
    email: NullableString,
    firstName: NullableString,
    lastName: Type.String(),
    userType: Type.String(),
    status: UserStatusSchema,
    validFrom: Type.Union([Type.String({ format: "date" }), Type.Null()]),
    validTo: Type.Union([Type.String({ format: "date" }), Type.Null()]),
    company: NullableString,
    country: NullableString,
    city: NullableString,
    directoryLastModified: Type.Union([
      Type.String({ format: "date-time" }),
      Type.Null(),
    ]),
    updatedAt: Type.Union([Type.String({ format: "date-time" }), Type.Null()]),
  },
  {
    examples: [
      {
        id: "u-1001",
        loginName: "jdoe",
        email: "jane.doe@example.com",
        firstName: "Jane",
        lastName: "Doe",
        userType: "employee",
        status: "ACTIVE",
        validFrom: "2024-01-01",
        validTo: null,
        company: "Example Corp",
        country: "DE",
        city: "Berlin",
        directoryLastModified: "2024-05-01T08:30:00.000Z",
        updatedAt: "2024-05-01T09:00:00.000Z",
      },
    ],
  }
);

export const GroupSchema = Type.Object(
  {
    id: Type.String(),
    name: NullableString,
    displayName: NullableString,
    description: NullableString,
    directoryLastModified: Type.Union([
      Type.String({ format: "date-time" }),
      Type.Null(),
    ]),
    updatedAt: Type.Union([Type.String({ format: "date-time" }), Type.Null()]),
  },
  {
    examples: [
      {
        id: "g-200",
        name: "engineering",
        displayName: "Engineering",
        description: "All engineers",
        directoryLastModified: "2024-05-01T08:30:00.000Z",
        updatedAt: "2024-05-01T09:00:00.000Z",
      },
    ],
  }
);

export const GroupDetailSchema = Type.Intersect([
  GroupSchema,
  Type.Object({ memberCount: Type.Number() }),
]);

export const UserListResponseSchema = createListResponseSchema(UserSchema);
export const UserResponseSchema = createResponseSchema(UserSchema);
export const GroupListResponseSchema = createListResponseSchema(GroupSchema);
export const GroupDetailResponseSchema =
  createResponseSchema(GroupDetailSchema);
export const UserGroupsResponseSchema = createResponseSchema(
  Type.Array(GroupSchema)
);

// ============================================================================
// Sync Schemas
// ============================================================================

export const RunStatsSchema = Type.Object({
  fetched: Type.Number(),
  inserted: Type.Number(),
  updated: Type.Number(),
  deleted: Type.Number(),
  unchanged: Type.Number(),
  skipped: Type.Number(),
  failed: Type.Number(),
});

export const ChangeRecordSchema = Type.Object({
  entityId: Type.String(),
  action: Type.Union([
    Type.Literal("INSERTED"),
    Type.Literal("UPDATED"),
    Type.Literal("DELETED"),
  ]),
  changedFields: Type.Optional(Type.Array(Type.String())),
  timestamp: Type.String({ format: "date-time" }),
});

export const StageResultSchema = Type.Object({
  stage: Type.String(),
  entityType: Type.String(),
  status: Type.Union([Type.Literal("succeeded"), Type.Literal("failed")]),
  stats: RunStatsSchema,
  changes: Type.Array(ChangeRecordSchema),
  snapshotDegraded: Type.Boolean(),
  error: Type.Optional(Type.String()),
  startedAt: Type.String({ format: "date-time" }),
  finishedAt: Type.String({ format: "date-time" }),
});

export const SyncRunReportSchema = Type.Object({
  startedAt: Type.String({ format: "date-time" }),
  finishedAt: Type.String({ format: "date-time" }),
  stages: Type.Array(StageResultSchema),
  totals: RunStatsSchema,
});

export const SyncNotificationSchema = Type.Object({
  hasChanges: Type.Boolean(),
  users: Type.Optional(StageResultSchema),
  groups: Type.Optional(StageResultSchema),
  userGroupAssignments: Type.Optional(StageResultSchema),
  groupMembers: Type.Optional(StageResultSchema),
});

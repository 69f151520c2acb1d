/**
 * SCIM 2.0 wire types
 *
 * Only the attributes the mirror reads are described. Objects stay open
 * (additional properties allowed) since providers attach their own extensions.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

export const SAP_USER_EXTENSION =
  "urn:ietf:params:scim:schemas:extension:sap:2.0:User";
export const ENTERPRISE_USER_EXTENSION =
  "urn:ietf:params:scim:schemas:extension:enterprise:2.0:User";
export const CUSTOM_GROUP_EXTENSION =
  "urn:sap:cloud:scim:schemas:extension:custom:2.0:Group";
export const PATCH_OP_SCHEMA = "urn:ietf:params:scim:api:messages:2.0:PatchOp";

const Nullable = <T extends TSchema>(schema: T) =>
  Type.Optional(Type.Union([schema, Type.Null()]));

// ============================================================================
// Shared complex attributes
// ============================================================================

export const ScimMultiValueSchema = Type.Object({
  value: Nullable(Type.String()),
  type: Nullable(Type.String()),
  primary: Nullable(Type.Boolean()),
  display: Nullable(Type.String()),
});

export const ScimAddressSchema = Type.Object({
  type: Nullable(Type.String()),
  country: Nullable(Type.String()),
  locality: Nullable(Type.String()),
});

export const ScimMetaSchema = Type.Object({
  resourceType: Nullable(Type.String()),
  created: Nullable(Type.String()),
  lastModified: Nullable(Type.String()),
});

// ============================================================================
// Resources
// ============================================================================

export const ScimUserSchema = Type.Object({
  id: Nullable(Type.String()),
  userName: Nullable(Type.String()),
  userType: Nullable(Type.String()),
  active: Nullable(Type.Boolean()),
  name: Nullable(
    Type.Object({
      familyName: Nullable(Type.String()),
      givenName: Nullable(Type.String()),
    })
  ),
  emails: Nullable(Type.Array(ScimMultiValueSchema)),
  addresses: Nullable(Type.Array(ScimAddressSchema)),
  groups: Nullable(Type.Array(ScimMultiValueSchema)),
  meta: Nullable(ScimMetaSchema),
  [SAP_USER_EXTENSION]: Nullable(
    Type.Object({
      status: Nullable(Type.String()),
      validFrom: Nullable(Type.String()),
      validTo: Nullable(Type.String()),
      emails: Nullable(Type.Array(ScimMultiValueSchema)),
      addresses: Nullable(Type.Array(ScimAddressSchema)),
    })
  ),
  [ENTERPRISE_USER_EXTENSION]: Nullable(
    Type.Object({
      organization: Nullable(Type.String()),
    })
  ),
});

export const ScimGroupSchema = Type.Object({
  id: Nullable(Type.String()),
  displayName: Nullable(Type.String()),
  members: Nullable(Type.Array(ScimMultiValueSchema)),
  meta: Nullable(ScimMetaSchema),
  [CUSTOM_GROUP_EXTENSION]: Nullable(
    Type.Object({
      name: Nullable(Type.String()),
      description: Nullable(Type.String()),
    })
  ),
});

/**
 * Envelope of GET /Users and GET /Groups. Resources are checked one by one
 * so that a single odd record does not reject a whole page.
 */
export const ScimListResponseSchema = Type.Object({
  totalResults: Nullable(Type.Integer({ minimum: 0 })),
  startIndex: Nullable(Type.Integer()),
  itemsPerPage: Nullable(Type.Integer()),
  Resources: Nullable(Type.Array(Type.Unknown())),
});

export type ScimMultiValue = Static<typeof ScimMultiValueSchema>;
export type ScimAddress = Static<typeof ScimAddressSchema>;
export type ScimUser = Static<typeof ScimUserSchema>;
export type ScimGroup = Static<typeof ScimGroupSchema>;
export type ScimListResponse = Static<typeof ScimListResponseSchema>;

export type ScimResourceType = "Users" | "Groups";

export interface ScimPatchOperation {
  op: "add" | "remove" | "replace";
  path?: string;
  value?: unknown;
}

export interface ScimPatchRequest {
  schemas: [typeof PATCH_OP_SCHEMA];
  Operations: ScimPatchOperation[];
}

// ============================================================================
// OAuth
// ============================================================================

export const TokenResponseSchema = Type.Object({
  access_token: Type.String({ minLength: 1 }),
  expires_in: Type.Optional(Type.Number()),
  token_type: Type.Optional(Type.String()),
});

export type TokenResponse = Static<typeof TokenResponseSchema>;

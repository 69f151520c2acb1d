/**
 * User Routes - /api/v1/users
 *
 * Group edits go to the directory one group at a time; groups it rejects are
 * reported as failed while the rest proceed.
 */

import { Type, type Static } from "@sinclair/typebox";

import { NotFoundError, ValidationError } from "../plugins/error-handler.js";
import {
  ApiErrorSchema,
  IdParamSchema,
  PaginationQuerySchema,
  UserStatusSchema,
} from "../schemas/common.js";
import {
  UserGroupsResponseSchema,
  UserListResponseSchema,
  UserResponseSchema,
} from "../schemas/responses.js";

import type { ApiDeps } from "./index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const ListUsersQuerySchema = Type.Intersect([
  PaginationQuerySchema,
  Type.Object({
    status: Type.Optional(UserStatusSchema),
    userType: Type.Optional(Type.String({ minLength: 1 })),
    email: Type.Optional(
      Type.String({ minLength: 1, description: "Exact match, case-insensitive" })
    ),
    country: Type.Optional(Type.String({ minLength: 1 })),
    search: Type.Optional(
      Type.String({
        description: "Substring of login name, email, first or last name",
      })
    ),
  }),
]);

type ListUsersQuery = Static<typeof ListUsersQuerySchema>;
type IdParam = Static<typeof IdParamSchema>;

const GroupIdsBodySchema = Type.Object({
  groupIds: Type.Array(Type.String({ minLength: 1 }), {
    minItems: 1,
    maxItems: 100,
  }),
});

type GroupIdsBody = Static<typeof GroupIdsBodySchema>;

const AddToGroupsResponseSchema = Type.Object({
  data: Type.Object({
    userId: Type.String(),
    added: Type.Array(Type.String()),
    failed: Type.Array(Type.String()),
  }),
});

const RemoveFromGroupsResponseSchema = Type.Object({
  data: Type.Object({
    userId: Type.String(),
    removed: Type.Array(Type.String()),
    failed: Type.Array(Type.String()),
  }),
});

// ============================================================================
// Routes
// ============================================================================

export function registerUserRoutes(
  app: FastifyInstance,
  { mirror, editor }: Pick<ApiDeps, "mirror" | "editor">
): void {
  async function requireUser(id: string): Promise<void> {
    const user = await mirror.getUser(id);
    if (!user) {
      throw new NotFoundError(`User ${id} not found`);
    }
  }

  async function requireKnownGroups(groupIds: string[]): Promise<void> {
    const known = new Set(await mirror.findGroupIds(groupIds));
    const unknown = [...new Set(groupIds)].filter((id) => !known.has(id));
    if (unknown.length > 0) {
      throw new ValidationError("Unknown groups", { groupIds: unknown });
    }
  }

  /**
   * GET /api/v1/users
   */
  app.get<{ Querystring: ListUsersQuery }>(
    "/users",
    {
      schema: {
        summary: "List users",
        description:
          "Mirrored users ordered by login name. Pass meta.pagination.cursor back as `cursor` for the next page.",
        tags: ["Users"],
        querystring: ListUsersQuerySchema,
        response: {
          200: UserListResponseSchema,
        },
      },
    },
    async (request) => {
      const result = await mirror.listUsers(request.query);
      return {
        data: result.items,
        meta: { pagination: result.pagination },
      };
    }
  );

  /**
   * GET /api/v1/users/:id
   */
  app.get<{ Params: IdParam }>(
    "/users/:id",
    {
      schema: {
        summary: "Get user",
        tags: ["Users"],
        params: IdParamSchema,
        response: {
          200: UserResponseSchema,
          404: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      const user = await mirror.getUser(request.params.id);
      if (!user) {
        throw new NotFoundError(`User ${request.params.id} not found`);
      }
      return { data: user };
    }
  );

  /**
   * GET /api/v1/users/:id/groups
   */
  app.get<{ Params: IdParam }>(
    "/users/:id/groups",
    {
      schema: {
        summary: "List groups of a user",
        tags: ["Users"],
        params: IdParamSchema,
        response: {
          200: UserGroupsResponseSchema,
          404: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      const { id } = request.params;
      await requireUser(id);
      return { data: await mirror.listGroupsForUser(id) };
    }
  );

  /**
   * POST /api/v1/users/:id/groups
   */
  app.post<{ Params: IdParam; Body: GroupIdsBody }>(
    "/users/:id/groups",
    {
      schema: {
        summary: "Add user to groups",
        description:
          "Adds the user to each group in the directory. Groups the directory rejects are listed in `failed`.",
        tags: ["Users"],
        params: IdParamSchema,
        body: GroupIdsBodySchema,
        response: {
          200: AddToGroupsResponseSchema,
          400: ApiErrorSchema,
          404: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      const { id } = request.params;
      await requireUser(id);
      await requireKnownGroups(request.body.groupIds);
      return { data: await editor.addUserToGroups(id, request.body.groupIds) };
    }
  );

  /**
   * DELETE /api/v1/users/:id/groups
   */
  app.delete<{ Params: IdParam; Body: GroupIdsBody }>(
    "/users/:id/groups",
    {
      schema: {
        summary: "Remove user from groups",
        tags: ["Users"],
        params: IdParamSchema,
        body: GroupIdsBodySchema,
        response: {
          200: RemoveFromGroupsResponseSchema,
          400: ApiErrorSchema,
          404: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      const { id } = request.params;
      await requireUser(id);
      await requireKnownGroups(request.body.groupIds);
      return {
        data: await editor.removeUserFromGroups(id, request.body.groupIds),
      };
    }
  );
}

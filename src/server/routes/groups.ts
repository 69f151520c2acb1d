/**
 * Group Routes - /api/v1/groups
 *
 * Reads come from the mirror. Membership edits are written to the directory
 * first and mirrored once it accepted them.
 */

import { Type, type Static } from "@sinclair/typebox";

import { NotFoundError } from "../plugins/error-handler.js";
import {
  ApiErrorSchema,
  IdParamSchema,
  PaginationQuerySchema,
} from "../schemas/common.js";
import {
  GroupDetailResponseSchema,
  GroupListResponseSchema,
  UserListResponseSchema,
} from "../schemas/responses.js";

import type { ApiDeps } from "./index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const ListGroupsQuerySchema = Type.Intersect([
  PaginationQuerySchema,
  Type.Object({
    search: Type.Optional(
      Type.String({ description: "Substring of name or display name" })
    ),
  }),
]);

type ListGroupsQuery = Static<typeof ListGroupsQuerySchema>;
type IdParam = Static<typeof IdParamSchema>;

const MemberParamsSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  userId: Type.String({ minLength: 1 }),
});

type MemberParams = Static<typeof MemberParamsSchema>;

const AddMembersBodySchema = Type.Object({
  userIds: Type.Array(Type.String({ minLength: 1 }), {
    minItems: 1,
    maxItems: 500,
  }),
});

type AddMembersBody = Static<typeof AddMembersBodySchema>;

const AddMembersResponseSchema = Type.Object({
  data: Type.Object({
    groupId: Type.String(),
    added: Type.Array(Type.String()),
    alreadyMembers: Type.Array(Type.String()),
  }),
});

// ============================================================================
// Routes
// ============================================================================

export function registerGroupRoutes(
  app: FastifyInstance,
  { mirror, editor }: Pick<ApiDeps, "mirror" | "editor">
): void {
  async function requireGroup(id: string): Promise<void> {
    const group = await mirror.getGroup(id);
    if (!group) {
      throw new NotFoundError(`Group ${id} not found`);
    }
  }

  /**
   * GET /api/v1/groups
   */
  app.get<{ Querystring: ListGroupsQuery }>(
    "/groups",
    {
      schema: {
        summary: "List groups",
        tags: ["Groups"],
        querystring: ListGroupsQuerySchema,
        response: {
          200: GroupListResponseSchema,
        },
      },
    },
    async (request) => {
      const result = await mirror.listGroups(request.query);
      return {
        data: result.items,
        meta: { pagination: result.pagination },
      };
    }
  );

  /**
   * GET /api/v1/groups/:id
   */
  app.get<{ Params: IdParam }>(
    "/groups/:id",
    {
      schema: {
        summary: "Get group",
        tags: ["Groups"],
        params: IdParamSchema,
        response: {
          200: GroupDetailResponseSchema,
          404: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      const group = await mirror.getGroup(request.params.id);
      if (!group) {
        throw new NotFoundError(`Group ${request.params.id} not found`);
      }
      return { data: group };
    }
  );

  /**
   * GET /api/v1/groups/:id/members
   */
  app.get<{ Params: IdParam; Querystring: Static<typeof PaginationQuerySchema> }>(
    "/groups/:id/members",
    {
      schema: {
        summary: "List group members",
        tags: ["Groups"],
        params: IdParamSchema,
        querystring: PaginationQuerySchema,
        response: {
          200: UserListResponseSchema,
          404: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      await requireGroup(request.params.id);
      const result = await mirror.listGroupMembers(
        request.params.id,
        request.query
      );
      return {
        data: result.items,
        meta: { pagination: result.pagination },
      };
    }
  );

  /**
   * POST /api/v1/groups/:id/members
   */
  app.post<{ Params: IdParam; Body: AddMembersBody }>(
    "/groups/:id/members",
    {
      schema: {
        summary: "Add group members",
        description:
          "Adds the users to the group in the directory, then records the new memberships locally.",
        tags: ["Groups"],
        params: IdParamSchema,
        body: AddMembersBodySchema,
        response: {
          200: AddMembersResponseSchema,
          404: ApiErrorSchema,
          502: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      await requireGroup(request.params.id);
      const result = await editor.addMembers(
        request.params.id,
        request.body.userIds
      );
      return { data: result };
    }
  );

  /**
   * DELETE /api/v1/groups/:id/members/:userId
   */
  app.delete<{ Params: MemberParams }>(
    "/groups/:id/members/:userId",
    {
      schema: {
        summary: "Remove group member",
        tags: ["Groups"],
        params: MemberParamsSchema,
        response: {
          204: Type.Null(),
          404: ApiErrorSchema,
          502: ApiErrorSchema,
        },
      },
    },
    async (request, reply) => {
      const { id, userId } = request.params;
      await requireGroup(id);
      await editor.removeMember(id, userId);
      return reply.status(204).send();
    }
  );
}

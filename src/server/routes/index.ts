/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerGroupRoutes } from "./groups.js";
import { registerSyncRoutes } from "./sync.js";
import { registerUserRoutes } from "./users.js";

import type { MembershipEditor } from "../../services/sync/membership-editor.js";
import type { ChangeNotifier } from "../../services/sync/notifier.js";
import type { SyncScheduler } from "../../services/sync/scheduler.js";
import type { MirrorReader } from "../services/mirror.service.js";
import type { FastifyInstance } from "fastify";

/**
 * Collaborators the routes need; built once by the composition root
 */
export interface ApiDeps {
  mirror: MirrorReader;
  notifier: ChangeNotifier;
  scheduler: Pick<SyncScheduler, "trigger" | "status">;
  editor: Pick<
    MembershipEditor,
    | "addMembers"
    | "removeMember"
    | "addUserToGroups"
    | "removeUserFromGroups"
  >;
}

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
  },
  {
    examples: [{ status: "ok" }],
  }
);

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: ApiDeps
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns the health status of the API",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    () => ({ status: "ok" as const })
  );

  await app.register(
    (api) => {
      registerSyncRoutes(api, deps);
      registerUserRoutes(api, deps);
      registerGroupRoutes(api, deps);
    },
    { prefix: "/api/v1" }
  );
}

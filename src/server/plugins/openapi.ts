/**
 * OpenAPI Plugin - Generates OpenAPI 3.0 specification
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "Directory Mirror API",
        description:
          "Read access to a local mirror of a SCIM identity directory, sync notifications " +
          "and membership edits that are written through to the directory.",
        version: "1.0.0",
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        {
          name: "Sync",
          description:
            "Trigger reconciliation passes and read or clear the pending change notification",
        },
        {
          name: "Users",
          description: "Mirrored directory users and their group assignments",
        },
        {
          name: "Groups",
          description:
            "Mirrored directory groups; membership edits go to the directory first",
        },
        {
          name: "Health",
          description: "Service health",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });

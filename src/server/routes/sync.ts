/**
 * Sync Routes - /api/v1/sync
 *
 * Change notification polling and on-demand reconciliation passes.
 */

import { Type } from "@sinclair/typebox";

import {
  SyncNotificationSchema,
  SyncRunReportSchema,
} from "../schemas/responses.js";

import type { ApiDeps } from "./index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const SchedulerStatusResponseSchema = Type.Object({
  data: Type.Object({
    running: Type.Boolean(),
    queued: Type.Boolean(),
    lastReport: Type.Union([SyncRunReportSchema, Type.Null()]),
  }),
});

const ClearResponseSchema = Type.Object({
  data: Type.Object({ cleared: Type.Literal(true) }),
});

// ============================================================================
// Routes
// ============================================================================

export function registerSyncRoutes(
  app: FastifyInstance,
  { notifier, scheduler }: Pick<ApiDeps, "notifier" | "scheduler">
): void {
  /**
   * GET /api/v1/sync/notification
   * Changes accumulated since the last clear
   */
  app.get(
    "/sync/notification",
    {
      schema: {
        summary: "Get pending change notification",
        description:
          "Returns the latest result per entity type while unacknowledged changes exist. " +
          "Reading does not clear the notification.",
        tags: ["Sync"],
        response: {
          200: Type.Object({ data: SyncNotificationSchema }),
        },
      },
    },
    () => ({ data: notifier.consume() })
  );

  /**
   * POST /api/v1/sync/notification/clear
   * Acknowledge the pending notification
   */
  app.post(
    "/sync/notification/clear",
    {
      schema: {
        summary: "Clear change notification",
        tags: ["Sync"],
        response: {
          200: ClearResponseSchema,
        },
      },
    },
    () => {
      notifier.clear();
      return { data: { cleared: true as const } };
    }
  );

  /**
   * POST /api/v1/sync/run
   * Run a reconciliation pass now
   */
  app.post(
    "/sync/run",
    {
      schema: {
        summary: "Run reconciliation",
        description:
          "Starts a pass, or waits for the single follow-up pass when one is already running. " +
          "Responds with the report of the pass that served the request.",
        tags: ["Sync"],
        response: {
          200: Type.Object({ data: SyncRunReportSchema }),
        },
      },
    },
    async (request) => {
      const report = await scheduler.trigger();
      request.log.info({ totals: report.totals }, "On-demand pass finished");
      return { data: report };
    }
  );

  /**
   * GET /api/v1/sync/status
   */
  app.get(
    "/sync/status",
    {
      schema: {
        summary: "Get scheduler status",
        tags: ["Sync"],
        response: {
          200: SchedulerStatusResponseSchema,
        },
      },
    },
    () => ({ data: scheduler.status() })
  );
}

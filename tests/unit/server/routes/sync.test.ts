import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { buildServer } from "../../../../src/server/app.js";
import { DirectoryUnavailableError } from "../../../../src/services/sync/errors.js";
import { emptyStats } from "../../../../src/services/sync/types.js";
import {
  createFakeDeps,
  runReport,
  stageResult,
  type FakeApiDeps,
} from "../../../mocks/api.js";

import type { FastifyInstance } from "fastify";

describe("server/routes/sync", () => {
  let deps: FakeApiDeps;
  let app: FastifyInstance;

  beforeEach(async () => {
    deps = createFakeDeps();
    app = await buildServer(deps, { logger: false });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  // ============================================================================
  // GET /api/v1/sync/notification
  // ============================================================================

  describe("GET /api/v1/sync/notification", () => {
    it("should report no changes before anything was published", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/v1/sync/notification",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ data: { hasChanges: false } });
    });

    it("should include the latest result per entity type once changes exist", async () => {
      deps.notifier.publish("users", stageResult());

      const response = await app.inject({
        method: "GET",
        url: "/api/v1/sync/notification",
      });

      const body = response.json();
      expect(body.data.hasChanges).toBe(true);
      expect(body.data.users.stage).toBe("SYNC_USERS");
      expect(body.data.users.stats.inserted).toBe(1);
      expect(body.data.groups).toBeUndefined();
    });

    it("should not clear the notification when read", async () => {
      deps.notifier.publish("users", stageResult());

      await app.inject({ method: "GET", url: "/api/v1/sync/notification" });
      const second = await app.inject({
        method: "GET",
        url: "/api/v1/sync/notification",
      });

      expect(second.json().data.hasChanges).toBe(true);
    });
  });

  // ============================================================================
  // POST /api/v1/sync/notification/clear
  // ============================================================================

  describe("POST /api/v1/sync/notification/clear", () => {
    it("should reset the notification", async () => {
      deps.notifier.publish("users", stageResult());

      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/notification/clear",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ data: { cleared: true } });
      expect(deps.notifier.consume()).toEqual({ hasChanges: false });
    });
  });

  // ============================================================================
  // POST /api/v1/sync/run
  // ============================================================================

  describe("POST /api/v1/sync/run", () => {
    it("should return the report of the triggered pass", async () => {
      deps.scheduler.trigger.mockResolvedValue(runReport([stageResult()]));

      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/run",
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.data.stages).toHaveLength(1);
      expect(body.data.totals.inserted).toBe(1);
      expect(deps.scheduler.trigger).toHaveBeenCalledTimes(1);
    });

    it("should keep failed stages and their error in the report", async () => {
      deps.scheduler.trigger.mockResolvedValue(
        runReport([
          stageResult({
            stage: "SYNC_GROUPS",
            entityType: "groups",
            status: "failed",
            stats: emptyStats(),
            changes: [],
            error: "GET /Groups failed: 503 Service Unavailable",
          }),
        ])
      );

      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/run",
      });

      const stage = response.json().data.stages[0];
      expect(stage.status).toBe("failed");
      expect(stage.error).toBe("GET /Groups failed: 503 Service Unavailable");
    });

    it("should map a rejected trigger through the error handler", async () => {
      deps.scheduler.trigger.mockRejectedValue(
        new DirectoryUnavailableError("GET /Users failed: 503", { status: 503 })
      );

      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/run",
      });

      expect(response.statusCode).toBe(502);
      expect(response.json().error).toBe("DIRECTORY_UNAVAILABLE");
    });
  });

  // ============================================================================
  // GET /api/v1/sync/status
  // ============================================================================

  describe("GET /api/v1/sync/status", () => {
    it("should return the scheduler state", async () => {
      deps.scheduler.status.mockReturnValue({
        running: true,
        queued: false,
        lastReport: null,
      });

      const response = await app.inject({
        method: "GET",
        url: "/api/v1/sync/status",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        data: { running: true, queued: false, lastReport: null },
      });
    });
  });

  // ============================================================================
  // Health and OpenAPI
  // ============================================================================

  describe("GET /health", () => {
    it("should return ok", async () => {
      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: "ok" });
    });
  });

  describe("GET /openapi.json", () => {
    it("should document the sync routes", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/openapi.json",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().info.title).toBe("Directory Mirror API");
      expect(Object.keys(response.json().paths)).toContain(
        "/api/v1/sync/run"
      );
    });
  });
});

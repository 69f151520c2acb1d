import Fastify, { type FastifyInstance } from "fastify";
import { describe, it, expect, beforeAll, afterAll } from "vitest";

import {
  errorHandler,
  NotFoundError,
  ValidationError,
  DatabaseError,
} from "../../../../src/server/plugins/error-handler.js";
import { DirectoryUnavailableError } from "../../../../src/services/sync/errors.js";

describe("server/plugins/error-handler", () => {
  // ============================================================================
  // Custom Error Classes Tests
  // ============================================================================

  describe("NotFoundError", () => {
    it("should create error with correct properties", () => {
      const error = new NotFoundError("Resource not found");

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe("NotFoundError");
      expect(error.code).toBe("NOT_FOUND");
      expect(error.statusCode).toBe(404);
    });
  });

  describe("ValidationError", () => {
    it("should accept optional details", () => {
      const details = { field: "userIds", reason: "empty" };
      const error = new ValidationError("Invalid input", details);

      expect(error.code).toBe("VALIDATION_ERROR");
      expect(error.statusCode).toBe(400);
      expect(error.details).toEqual(details);
    });
  });

  describe("DatabaseError", () => {
    it("should map to service unavailable", () => {
      const error = new DatabaseError("Connection failed");

      expect(error.code).toBe("DATABASE_ERROR");
      expect(error.statusCode).toBe(503);
    });
  });

  // ============================================================================
  // Error Handler Plugin Tests
  // ============================================================================

  describe("errorHandler plugin", () => {
    let app: FastifyInstance;

    beforeAll(async () => {
      app = Fastify({ logger: false });
      await app.register(errorHandler);

      app.get("/not-found", async () => {
        throw new NotFoundError("User u1 not found");
      });

      app.get("/validation-error", async () => {
        throw new ValidationError("Invalid parameters", { field: "id" });
      });

      app.get("/directory-error", async () => {
        throw new DirectoryUnavailableError(
          "PATCH /Groups/g1 failed: 400 Bad Request",
          { status: 400 }
        );
      });

      app.get("/directory-timeout", async () => {
        throw new DirectoryUnavailableError("GET /Users failed: timeout");
      });

      app.get("/database-error", async () => {
        throw new DatabaseError("Listing users failed: connection refused");
      });

      app.get("/generic-error", async () => {
        throw new Error("Something went wrong");
      });

      app.get("/fastify-404", async () => {
        throw Object.assign(new Error("Not found"), { statusCode: 404 });
      });

      app.get("/fastify-validation", async () => {
        throw Object.assign(new Error("Validation failed"), {
          validation: [{ keyword: "type", message: "must be string" }],
        });
      });

      await app.ready();
    });

    afterAll(async () => {
      await app.close();
    });

    it("should handle NotFoundError", async () => {
      const response = await app.inject({ method: "GET", url: "/not-found" });

      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body.error).toBe("NOT_FOUND");
      expect(body.message).toBe("User u1 not found");
      expect(body.requestId).toBeDefined();
    });

    it("should handle ValidationError with details", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/validation-error",
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.error).toBe("VALIDATION_ERROR");
      expect(body.details).toEqual({ field: "id" });
    });

    it("should map directory failures to bad gateway with the status", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/directory-error",
      });

      expect(response.statusCode).toBe(502);
      const body = response.json();
      expect(body.error).toBe("DIRECTORY_UNAVAILABLE");
      expect(body.message).toBe("PATCH /Groups/g1 failed: 400 Bad Request");
      expect(body.details).toEqual({ status: 400 });
    });

    it("should omit details for directory failures without a status", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/directory-timeout",
      });

      expect(response.statusCode).toBe(502);
      expect(response.json().details).toBeUndefined();
    });

    it("should handle DatabaseError", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/database-error",
      });

      expect(response.statusCode).toBe(503);
      expect(response.json().error).toBe("DATABASE_ERROR");
    });

    it("should handle generic errors with 500 status", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/generic-error",
      });

      expect(response.statusCode).toBe(500);
      const body = response.json();
      expect(body.error).toBe("INTERNAL_ERROR");
      expect(body.message).toBe("An unexpected error occurred");
    });

    it("should handle Fastify 404 errors", async () => {
      const response = await app.inject({ method: "GET", url: "/fastify-404" });

      expect(response.statusCode).toBe(404);
      expect(response.json().error).toBe("NOT_FOUND");
    });

    it("should handle Fastify validation errors", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/fastify-validation",
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.error).toBe("VALIDATION_ERROR");
      expect(body.details.validation).toEqual([
        { keyword: "type", message: "must be string" },
      ]);
    });

    it("should handle unknown routes", async () => {
      const response = await app.inject({ method: "GET", url: "/nowhere" });

      expect(response.statusCode).toBe(404);
      expect(response.json().message).toBe("Route GET /nowhere not found");
    });
  });
});

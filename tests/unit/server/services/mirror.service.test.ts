import { describe, it, expect } from "vitest";

import {
  likePattern,
  toGroupDto,
  toUserDto,
} from "../../../../src/server/services/mirror.service.js";

describe("server/services/mirror.service", () => {
  describe("likePattern", () => {
    it("should wrap the term for a substring match", () => {
      expect(likePattern("ann")).toBe("%ann%");
    });

    it("should escape wildcards and the escape character", () => {
      expect(likePattern("50%_a\\b")).toBe("%50\\%\\_a\\\\b%");
    });
  });

  describe("toUserDto", () => {
    it("should drop the creation timestamp", () => {
      const dto = toUserDto({
        id: "u1",
        login_name: "ann",
        email: null,
        last_name: "Smith",
        first_name: null,
        user_type: "contractor",
        status: "INACTIVE",
        valid_from: null,
        valid_to: "2024-12-31",
        company: null,
        country: null,
        city: null,
        directory_last_modified: null,
        created_at: new Date("2024-01-01T00:00:00Z"),
        updated_at: new Date("2024-06-01T12:00:00Z"),
      });

      expect(dto).not.toHaveProperty("createdAt");
      expect(dto.validTo).toBe("2024-12-31");
      expect(dto.updatedAt).toBe("2024-06-01T12:00:00.000Z");
    });
  });

  describe("toGroupDto", () => {
    it("should map a group row", () => {
      const dto = toGroupDto({
        id: "g1",
        name: null,
        display_name: "Operations",
        description: "On-call rota",
        directory_last_modified: new Date("2024-03-01T10:00:00Z"),
        created_at: new Date("2024-01-01T00:00:00Z"),
        updated_at: new Date("2024-01-01T00:00:00Z"),
      });

      expect(dto).toEqual({
        id: "g1",
        name: null,
        displayName: "Operations",
        description: "On-call rota",
        directoryLastModified: "2024-03-01T10:00:00.000Z",
        updatedAt: "2024-01-01T00:00:00.000Z",
      });
    });
  });
});

import { describe, it, expect } from "vitest";

import {
  USER_COMPARABLE_FIELDS,
  normalizeUser,
} from "../../../../src/services/sync/canonical/users.js";
import {
  changedFields,
  diff,
  sameValue,
} from "../../../../src/services/sync/diff.js";
import {
  SAP_USER_EXTENSION,
  canonicalUser,
  scimUser,
} from "../../../fixtures/scim.js";

import type {
  DirectoryUser,
  LocalRecord,
} from "../../../../src/services/sync/types.js";

function local(
  user: DirectoryUser,
  updatedAt = "2024-01-01T00:00:00.000Z"
): LocalRecord<DirectoryUser> {
  return { ...user, createdAt: updatedAt, updatedAt };
}

function byId<T extends { id: string }>(records: T[]): Map<string, T> {
  return new Map(records.map((record) => [record.id, record]));
}

const options = { comparableFields: USER_COMPARABLE_FIELDS };

describe("services/sync/diff", () => {
  describe("sameValue", () => {
    it("should treat null and undefined as equal", () => {
      expect(sameValue(null, undefined)).toBe(true);
      expect(sameValue(null, null)).toBe(true);
    });

    it("should treat a missing value as different from any value", () => {
      expect(sameValue(null, "")).toBe(false);
      expect(sameValue("x", undefined)).toBe(false);
    });

    it("should compare present values strictly", () => {
      expect(sameValue("a", "a")).toBe(true);
      expect(sameValue("a", "A")).toBe(false);
    });
  });

  describe("changedFields", () => {
    it("should list exactly the differing comparable fields in order", () => {
      const remote = canonicalUser("u1", { city: "Hamburg", email: null });
      const stored = canonicalUser("u1");

      expect(changedFields(remote, stored, USER_COMPARABLE_FIELDS)).toEqual([
        "email",
        "city",
      ]);
    });
  });

  describe("diff", () => {
    it("should classify new, changed, unchanged and orphaned records", () => {
      const result = diff(
        byId([
          canonicalUser("u1"),
          canonicalUser("u2", { lastName: "Renamed" }),
          canonicalUser("u3"),
        ]),
        byId([
          local(canonicalUser("u2")),
          local(canonicalUser("u3")),
          local(canonicalUser("u4")),
        ]),
        options
      );

      expect(result.toInsert.map((user) => user.id)).toEqual(["u1"]);
      expect(result.toUpdate).toEqual([
        {
          id: "u2",
          record: canonicalUser("u2", { lastName: "Renamed" }),
          changedFields: ["lastName"],
        },
      ]);
      expect(result.unchanged).toBe(1);
      expect(result.toDelete.map((user) => user.id)).toEqual(["u4"]);
    });

    it("should ignore directory timestamps and bookkeeping columns", () => {
      const result = diff(
        byId([
          canonicalUser("u1", {
            directoryLastModified: "2030-01-01T00:00:00.000Z",
          }),
        ]),
        byId([local(canonicalUser("u1"), "2020-01-01T00:00:00.000Z")]),
        options
      );

      expect(result.toUpdate).toEqual([]);
      expect(result.unchanged).toBe(1);
    });

    it("should never delete protected local records", () => {
      const result = diff(
        new Map<string, DirectoryUser>(),
        byId([local(canonicalUser("u1")), local(canonicalUser("u2"))]),
        { ...options, isProtected: (record) => record.id === "u1" }
      );

      expect(result.toDelete.map((user) => user.id)).toEqual(["u2"]);
    });

    it("should delete everything local when the remote set is empty", () => {
      const result = diff(
        new Map<string, DirectoryUser>(),
        byId([local(canonicalUser("u1"))]),
        options
      );

      expect(result.toDelete).toHaveLength(1);
      expect(result.toInsert).toEqual([]);
    });
  });

  // ============================================================================
  // Day-granularity validity dates
  // ============================================================================

  describe("validity dates", () => {
    function remoteWithValidFrom(validFrom: string): DirectoryUser {
      const normalized = normalizeUser(
        scimUser("u1", { [SAP_USER_EXTENSION]: { validFrom } })
      );
      if (!normalized.ok) {
        throw new Error(normalized.reason);
      }
      return normalized.value;
    }

    // DATE columns come back from pg as YYYY-MM-DD
    const stored = local(canonicalUser("u1", { validFrom: "2024-01-01" }));

    it("should treat a timestamp on the stored day as unchanged", () => {
      const remote = remoteWithValidFrom("2024-01-01T23:30:00+02:00");

      const result = diff(byId([remote]), byId([stored]), options);

      expect(result.unchanged).toBe(1);
      expect(result.toUpdate).toEqual([]);
    });

    it("should report validFrom alone when the day differs", () => {
      const remote = remoteWithValidFrom("2024-01-02T00:30:00+02:00");

      const result = diff(byId([remote]), byId([stored]), options);

      expect(result.toUpdate).toEqual([
        {
          id: "u1",
          record: remote,
          changedFields: ["validFrom"],
        },
      ]);
    });
  });
});

import { describe, it, expect } from "vitest";

import {
  idOf,
  normalizeUser,
  userDescriptor,
} from "../../../../../src/services/sync/canonical/users.js";
import {
  canonicalUser,
  ENTERPRISE_USER_EXTENSION,
  SAP_USER_EXTENSION,
  scimUser,
} from "../../../../fixtures/scim.js";
import { InMemoryMirrorStore } from "../../../../mocks/store.js";

describe("canonical/users", () => {
  // ============================================================================
  // Conversion
  // ============================================================================

  describe("normalizeUser", () => {
    it("should convert a complete SCIM user", () => {
      expect(normalizeUser(scimUser("u1"))).toEqual({
        ok: true,
        value: canonicalUser("u1"),
      });
    });

    it("should read the enterprise organization and SAP validity dates", () => {
      const result = normalizeUser(
        scimUser("u1", {
          [ENTERPRISE_USER_EXTENSION]: { organization: "Example Corp" },
          [SAP_USER_EXTENSION]: {
            validFrom: "2024-01-01T00:00:00Z",
            validTo: "2025-12-31",
          },
        })
      );

      expect(result).toEqual({
        ok: true,
        value: canonicalUser("u1", {
          company: "Example Corp",
          validFrom: "2024-01-01",
          validTo: "2025-12-31",
        }),
      });
    });

    it("should derive status from active before the extension status", () => {
      const inactive = normalizeUser(
        scimUser("u1", {
          active: false,
          [SAP_USER_EXTENSION]: { status: "active" },
        })
      );
      const fromExtension = normalizeUser(
        scimUser("u2", {
          active: undefined,
          [SAP_USER_EXTENSION]: { status: "inactive" },
        })
      );
      const defaulted = normalizeUser(scimUser("u3", { active: null }));

      expect(inactive.ok && inactive.value.status).toBe("INACTIVE");
      expect(fromExtension.ok && fromExtension.value.status).toBe("INACTIVE");
      expect(defaulted.ok && defaulted.value.status).toBe("ACTIVE");
    });

    it("should prefer the home address, then work, then the first one", () => {
      const home = normalizeUser(
        scimUser("u1", {
          addresses: [
            { type: "work", country: "DE", locality: "Berlin" },
            { type: "home", country: "FR", locality: "Lyon" },
          ],
        })
      );
      const first = normalizeUser(
        scimUser("u2", {
          addresses: [
            { type: "other", country: "IT", locality: "Rome" },
            { type: "billing", country: "ES", locality: "Madrid" },
          ],
        })
      );

      expect(home.ok && [home.value.country, home.value.city]).toEqual([
        "FR",
        "Lyon",
      ]);
      expect(first.ok && [first.value.country, first.value.city]).toEqual([
        "IT",
        "Rome",
      ]);
    });

    it("should fall back to the SAP extension for email and address", () => {
      const result = normalizeUser(
        scimUser("u1", {
          emails: [],
          addresses: undefined,
          [SAP_USER_EXTENSION]: {
            emails: [{ value: "sap@example.com" }],
            addresses: [{ type: "work", country: "AT", locality: "Wien" }],
          },
        })
      );

      expect(result.ok && result.value.email).toBe("sap@example.com");
      expect(result.ok && result.value.country).toBe("AT");
      expect(result.ok && result.value.city).toBe("Wien");
    });

    it("should use the email as login name when userName is blank", () => {
      const result = normalizeUser(scimUser("u1", { userName: "  " }));
      expect(result.ok && result.value.loginName).toBe("u1@example.com");
    });

    it("should map blank optional fields to null", () => {
      const result = normalizeUser(
        scimUser("u1", { name: { familyName: "Doe", givenName: "" } })
      );
      expect(result.ok && result.value.firstName).toBeNull();
    });

    it("should list every missing required field", () => {
      const result = normalizeUser(
        scimUser("u1", {
          userType: "",
          name: { givenName: "Jane" },
        })
      );

      expect(result).toEqual({
        ok: false,
        ownerId: "u1",
        reason: "missing required field: lastName, userType",
      });
    });

    it("should reject a user without an id and without an owner", () => {
      expect(normalizeUser(scimUser("u1", { id: undefined }))).toEqual({
        ok: false,
        ownerId: null,
        reason: "missing required field: id",
      });
    });

    it("should reject resources with the wrong shape", () => {
      expect(normalizeUser(scimUser("u1", { emails: "x@example.com" }))).toEqual(
        { ok: false, ownerId: "u1", reason: "malformed resource" }
      );
      expect(normalizeUser("not a user")).toEqual({
        ok: false,
        ownerId: null,
        reason: "malformed resource",
      });
    });
  });

  describe("idOf", () => {
    it("should read a string id from any object", () => {
      expect(idOf({ id: "u9", emails: 3 })).toBe("u9");
      expect(idOf({ id: 9 })).toBeNull();
      expect(idOf(null)).toBeNull();
    });
  });

  // ============================================================================
  // Descriptor
  // ============================================================================

  describe("userDescriptor", () => {
    it("should remove the user together with its memberships", async () => {
      const store = new InMemoryMirrorStore();
      store.seedUser(canonicalUser("u1"));
      store.seedEdge("g1", "u1");
      store.seedEdge("g2", "u1");
      store.seedEdge("g1", "u2");

      await store.transaction((tx) =>
        userDescriptor.remove(tx, canonicalUser("u1"))
      );

      expect(store.userIds()).toEqual([]);
      expect(store.edgeKeys()).toEqual(["g1:u2"]);
    });
  });
});

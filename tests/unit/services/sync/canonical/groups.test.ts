import { describe, it, expect } from "vitest";

import {
  groupDescriptor,
  normalizeGroup,
} from "../../../../../src/services/sync/canonical/groups.js";
import {
  canonicalGroup,
  CUSTOM_GROUP_EXTENSION,
  scimGroup,
} from "../../../../fixtures/scim.js";
import { InMemoryMirrorStore } from "../../../../mocks/store.js";

describe("canonical/groups", () => {
  describe("normalizeGroup", () => {
    it("should convert a SCIM group", () => {
      expect(normalizeGroup(scimGroup("g1", ["u1"]))).toEqual({
        ok: true,
        value: canonicalGroup("g1"),
      });
    });

    it("should read name and description from the custom extension", () => {
      const result = normalizeGroup(
        scimGroup("g1", [], {
          [CUSTOM_GROUP_EXTENSION]: {
            name: "admins",
            description: "Administrators",
          },
        })
      );

      expect(result).toEqual({
        ok: true,
        value: canonicalGroup("g1", {
          name: "admins",
          description: "Administrators",
        }),
      });
    });

    it("should accept a group with only an id", () => {
      expect(normalizeGroup({ id: "g2" })).toEqual({
        ok: true,
        value: {
          id: "g2",
          name: null,
          displayName: null,
          description: null,
          directoryLastModified: null,
        },
      });
    });

    it("should reject a group without an id", () => {
      expect(normalizeGroup({ displayName: "Nameless" })).toEqual({
        ok: false,
        ownerId: null,
        reason: "missing required field: id",
      });
    });

    it("should reject malformed groups but keep their id as owner", () => {
      expect(normalizeGroup({ id: "g3", members: "u1" })).toEqual({
        ok: false,
        ownerId: "g3",
        reason: "malformed resource",
      });
    });
  });

  describe("groupDescriptor", () => {
    it("should remove the group together with its memberships", async () => {
      const store = new InMemoryMirrorStore();
      store.seedGroup(canonicalGroup("g1"));
      store.seedEdge("g1", "u1");
      store.seedEdge("g2", "u1");

      await store.transaction((tx) =>
        groupDescriptor.remove(tx, canonicalGroup("g1"))
      );

      expect(store.groupIds()).toEqual([]);
      expect(store.edgeKeys()).toEqual(["g2:u1"]);
    });
  });
});

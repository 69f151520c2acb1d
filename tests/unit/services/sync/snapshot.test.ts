import { describe, it, expect } from "vitest";

import { groupDescriptor } from "../../../../src/services/sync/canonical/groups.js";
import { membershipsByGroupDescriptor } from "../../../../src/services/sync/canonical/memberships.js";
import { loadSnapshot } from "../../../../src/services/sync/snapshot.js";
import { canonicalGroup } from "../../../fixtures/scim.js";
import { InMemoryMirrorStore } from "../../../mocks/store.js";

describe("services/sync/snapshot", () => {
  it("should key local records with the descriptor's key", async () => {
    const store = new InMemoryMirrorStore();
    store.seedEdge("g1", "u1");
    store.seedEdge("g2", "u1");

    const snapshot = await loadSnapshot(membershipsByGroupDescriptor, store);

    expect(snapshot.degraded).toBe(false);
    expect([...snapshot.records.keys()]).toEqual(["g1:u1", "g2:u1"]);
  });

  it("should degrade to an empty snapshot when the read fails", async () => {
    const store = new InMemoryMirrorStore();
    store.seedGroup(canonicalGroup("g1"));
    store.failLoads.add("groups");

    const snapshot = await loadSnapshot(groupDescriptor, store);

    expect(snapshot).toEqual({ records: new Map(), degraded: true });
  });
});

import { describe, it, expect, beforeEach } from "vitest";
import { createMemoryDatabase, createMemoryResourceStore } from "../../src/db/memory.js";
import type { ResourceStore } from "../../src/db/interface.js";
import { ResourceStoreError, isConflict, isNotFound } from "../../src/db/errors.js";
import { makeCluster } from "../helpers/fixtures.js";

describe("Memory ResourceStore", () => {
  let store: ResourceStore;

  beforeEach(() => {
    store = createMemoryResourceStore();
  });

  describe("get/create", () => {
    it("returns null for a missing object", async () => {
      expect(await store.managedClusters.get({ name: "nope" })).toBeNull();
    });

    it("stamps a resourceVersion on create", async () => {
      const created = await store.managedClusters.create(makeCluster("c1"));
      expect(created.metadata.resourceVersion).toBe("1");

      const fetched = await store.managedClusters.get({ name: "c1" });
      expect(fetched?.metadata.resourceVersion).toBe("1");
    });

    it("rejects a duplicate create with AlreadyExists", async () => {
      await store.managedClusters.create(makeCluster("c1"));
      await expect(store.managedClusters.create(makeCluster("c1"))).rejects.toMatchObject({
        name: "ResourceStoreError",
        reason: "AlreadyExists",
      });
    });

    it("rejects an empty name with Invalid", async () => {
      await expect(store.managedClusters.create(makeCluster(""))).rejects.toMatchObject({ reason: "Invalid" });
    });

    it("keys namespaced kinds by namespace and name", async () => {
      await store.secrets.create({ metadata: { name: "s", namespace: "a" }, data: { k: Buffer.from("1") } });
      await store.secrets.create({ metadata: { name: "s", namespace: "b" }, data: { k: Buffer.from("2") } });

      const a = await store.secrets.get({ name: "s", namespace: "a" });
      const b = await store.secrets.get({ name: "s", namespace: "b" });
      expect(a?.data.k.toString()).toBe("1");
      expect(b?.data.k.toString()).toBe("2");
      expect(await store.secrets.get({ name: "s" })).toBeNull();
    });

    it("ignores namespace on cluster-scoped kinds", async () => {
      await store.agentConfigs.create({ metadata: { name: "cfg", namespace: "stray" }, spec: {} });
      const found = await store.agentConfigs.get({ name: "cfg" });
      expect(found?.metadata.namespace).toBeUndefined();
    });

    it("hands out copies, not references", async () => {
      await store.secrets.create({ metadata: { name: "s", namespace: "ns" }, data: { k: Buffer.from("abc") } });
      const first = await store.secrets.get({ name: "s", namespace: "ns" });
      first?.data.k.fill(0);

      const second = await store.secrets.get({ name: "s", namespace: "ns" });
      expect(second?.data.k.toString()).toBe("abc");
    });
  });

  describe("update", () => {
    it("replaces the object and bumps the version", async () => {
      const created = await store.managedClusters.create(makeCluster("c1"));
      created.metadata.annotations = { a: "b" };

      const updated = await store.managedClusters.update(created);
      expect(updated.metadata.resourceVersion).toBe("2");
      expect(updated.metadata.annotations).toEqual({ a: "b" });
    });

    it("fails with Conflict on a stale resourceVersion", async () => {
      const created = await store.managedClusters.create(makeCluster("c1"));
      await store.managedClusters.update(created);

      const err = await store.managedClusters.update(created).catch((e: unknown) => e);
      expect(isConflict(err)).toBe(true);
    });

    it("writes unconditionally without a resourceVersion", async () => {
      const created = await store.managedClusters.create(makeCluster("c1"));
      await store.managedClusters.update(created);

      const blind = makeCluster("c1", "Unknown");
      const updated = await store.managedClusters.update(blind);
      expect(updated.status.conditions[0].status).toBe("Unknown");
    });

    it("fails with NotFound for a missing object", async () => {
      const err = await store.managedClusters.update(makeCluster("ghost")).catch((e: unknown) => e);
      expect(isNotFound(err)).toBe(true);
    });
  });

  describe("delete", () => {
    it("removes the object", async () => {
      await store.managedClusters.create(makeCluster("c1"));
      await store.managedClusters.delete({ name: "c1" });
      expect(await store.managedClusters.get({ name: "c1" })).toBeNull();
    });

    it("fails with NotFound when already gone", async () => {
      const err = await store.managedClusters.delete({ name: "c1" }).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ResourceStoreError);
      expect(isNotFound(err)).toBe(true);
    });
  });

  it("lists every object of a kind", async () => {
    await store.managedClusters.create(makeCluster("c1"));
    await store.managedClusters.create(makeCluster("c2"));
    const names = (await store.managedClusters.list()).map((c) => c.metadata.name);
    expect(names).toEqual(["c1", "c2"]);
  });
});

describe("Memory AuditStore", () => {
  function entry(id: string, timestamp: number) {
    return { id, timestamp, hub: "hub1", action: "migration.test", level: "GREEN" as const, detail: id };
  }

  it("counts only entries at or after since", () => {
    const { audit } = createMemoryDatabase();
    audit.insert(entry("a", 100));
    audit.insert(entry("b", 200));
    audit.insert(entry("c", 300));

    expect(audit.count({ since: 200 })).toBe(2);
    expect(audit.count({ since: 200, action: "migration.test" })).toBe(2);
    expect(audit.count({ since: 400 })).toBe(0);
  });
});

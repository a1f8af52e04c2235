import { describe, it, expect, beforeEach } from "vitest";
import { propagateCredentials } from "../../../src/migration/credentials.js";
import { decodeMigrationInstruction } from "../../../src/migration/decoder.js";
import { createMemoryResourceStore } from "../../../src/db/memory.js";
import type { ResourceStore } from "../../../src/db/interface.js";
import type { BootstrapSecret, Logger } from "../../../src/types.js";
import { makeLogger } from "../../helpers/fixtures.js";

function credential(data: Record<string, string>): BootstrapSecret {
  const bytes: Record<string, Buffer> = {};
  for (const [k, v] of Object.entries(data)) bytes[k] = Buffer.from(v);
  return { metadata: { name: "bootstrap-hub2", namespace: "handoff-agent" }, data: bytes };
}

function text(secret: BootstrapSecret | null): Record<string, string> | null {
  if (!secret) return null;
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(secret.data)) out[k] = v.toString();
  return out;
}

describe("propagateCredentials", () => {
  let store: ResourceStore;
  let logger: Logger;

  beforeEach(() => {
    store = createMemoryResourceStore();
    logger = makeLogger();
  });

  it("creates the primary and the backup with identical data", async () => {
    const result = await propagateCredentials(store.secrets, credential({ kubeconfig: "test-kubeconfig" }), logger);

    expect(result.primary.metadata.name).toBe("bootstrap-hub2");
    expect(result.backup.metadata.name).toBe("bootstrap-hub2-backup");
    expect(result.backup.metadata.namespace).toBe("handoff-agent");

    const primary = await store.secrets.get({ name: "bootstrap-hub2", namespace: "handoff-agent" });
    const backup = await store.secrets.get({ name: "bootstrap-hub2-backup", namespace: "handoff-agent" });
    expect(text(primary)).toEqual({ kubeconfig: "test-kubeconfig" });
    expect(text(backup)).toEqual({ kubeconfig: "test-kubeconfig" });
    expect(logger.info).toHaveBeenCalledWith(
      "[handoff:migration:credentials] Creating bootstrap secret handoff-agent/bootstrap-hub2",
    );
  });

  it("replaces the data of existing secrets without merging", async () => {
    await store.secrets.create({
      metadata: { name: "bootstrap-hub2", namespace: "handoff-agent", labels: { owner: "ops" } },
      data: { stale: Buffer.from("old"), kubeconfig: Buffer.from("old") },
    });

    await propagateCredentials(store.secrets, credential({ kubeconfig: "test-kubeconfig" }), logger);

    const primary = await store.secrets.get({ name: "bootstrap-hub2", namespace: "handoff-agent" });
    expect(text(primary)).toEqual({ kubeconfig: "test-kubeconfig" });
    expect(primary?.metadata.labels).toEqual({ owner: "ops" });
    expect(logger.info).toHaveBeenCalledWith(
      "[handoff:migration:credentials] Updating bootstrap secret handoff-agent/bootstrap-hub2",
    );
  });

  it("converges when run twice", async () => {
    const cred = credential({ kubeconfig: "test-kubeconfig" });
    await propagateCredentials(store.secrets, cred, logger);
    await propagateCredentials(store.secrets, cred, logger);

    const all = await store.secrets.list();
    expect(all.map((s) => s.metadata.name)).toEqual(["bootstrap-hub2", "bootstrap-hub2-backup"]);
    expect(all.map(text)).toEqual([{ kubeconfig: "test-kubeconfig" }, { kubeconfig: "test-kubeconfig" }]);
  });

  it("writes the backup from the instruction, not from the stored primary", async () => {
    await store.secrets.create({
      metadata: { name: "bootstrap-hub2", namespace: "handoff-agent" },
      data: { extra: Buffer.from("kept-in-primary-only") },
    });

    await propagateCredentials(store.secrets, credential({ token: "test-token" }), logger);

    const backup = await store.secrets.get({ name: "bootstrap-hub2-backup", namespace: "handoff-agent" });
    expect(text(backup)).toEqual({ token: "test-token" });
  });

  it("stores a data key named __proto__ in both secrets", async () => {
    const cred = decodeMigrationInstruction(
      '{"bootstrapSecret":{"metadata":{"name":"bootstrap-hub2","namespace":"handoff-agent"},' +
        '"data":{"__proto__":"YWJj","k":"eHl6"}},' +
        '"agentConfig":{"metadata":{"name":"cfg"}},"managedClusters":[]}',
    ).bootstrapCredential;

    await propagateCredentials(store.secrets, cred, logger);

    for (const name of ["bootstrap-hub2", "bootstrap-hub2-backup"]) {
      const stored = await store.secrets.get({ name, namespace: "handoff-agent" });
      const data = stored?.data ?? {};
      expect(Object.keys(data)).toEqual(["__proto__", "k"]);
      expect(Object.getOwnPropertyDescriptor(data, "__proto__")?.value.toString()).toBe("abc");
    }
  });

  it("does not share buffers with the instruction", async () => {
    const cred = credential({ kubeconfig: "test-kubeconfig" });
    await propagateCredentials(store.secrets, cred, logger);
    cred.data.kubeconfig.fill(0);

    const primary = await store.secrets.get({ name: "bootstrap-hub2", namespace: "handoff-agent" });
    expect(text(primary)).toEqual({ kubeconfig: "test-kubeconfig" });
  });

  it("stops before the backup when the primary write fails", async () => {
    const failing: ResourceStore["secrets"] = {
      ...store.secrets,
      create: async () => {
        throw new Error("store unavailable");
      },
    };

    await expect(
      propagateCredentials(failing, credential({ kubeconfig: "test-kubeconfig" }), logger),
    ).rejects.toThrow("store unavailable");
    expect(await store.secrets.list()).toEqual([]);
  });
});

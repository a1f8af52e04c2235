import { describe, it, expect, beforeEach } from "vitest";
import { provisionTargetConfig } from "../../../src/migration/target-config.js";
import { createMemoryResourceStore } from "../../../src/db/memory.js";
import type { ResourceStore } from "../../../src/db/interface.js";
import type { AgentConfig, BootstrapSecret, Logger } from "../../../src/types.js";
import { makeLogger } from "../../helpers/fixtures.js";

const credential: BootstrapSecret = {
  metadata: { name: "bootstrap-hub2", namespace: "handoff-agent" },
  data: {},
};

const target: AgentConfig = {
  metadata: { name: "migrate-to-hub2" },
  spec: { hubAddress: "https://hub2.example.test" },
};

describe("provisionTargetConfig", () => {
  let store: ResourceStore;
  let logger: Logger;

  beforeEach(() => {
    store = createMemoryResourceStore();
    logger = makeLogger();
  });

  it("creates the config pointing at primary then backup", async () => {
    const result = await provisionTargetConfig(store.agentConfigs, target, credential, logger);

    expect(result.created).toBe(true);
    const stored = await store.agentConfigs.get({ name: "migrate-to-hub2" });
    expect(stored?.spec).toEqual({
      hubAddress: "https://hub2.example.test",
      bootstrapCredentials: {
        type: "LocalSecrets",
        secretRefs: [{ name: "bootstrap-hub2" }, { name: "bootstrap-hub2-backup" }],
      },
    });
  });

  it("replaces credentials carried in by the instruction", async () => {
    const withRefs: AgentConfig = {
      metadata: { name: "migrate-to-hub2" },
      spec: { bootstrapCredentials: { type: "LocalSecrets", secretRefs: [{ name: "other" }] } },
    };

    await provisionTargetConfig(store.agentConfigs, withRefs, credential, logger);

    const stored = await store.agentConfigs.get({ name: "migrate-to-hub2" });
    expect(stored?.spec.bootstrapCredentials?.secretRefs).toEqual([
      { name: "bootstrap-hub2" },
      { name: "bootstrap-hub2-backup" },
    ]);
  });

  it("leaves an existing config untouched", async () => {
    const existing = await store.agentConfigs.create({
      metadata: { name: "migrate-to-hub2" },
      spec: { bootstrapCredentials: { type: "LocalSecrets", secretRefs: [{ name: "earlier" }] } },
    });

    const result = await provisionTargetConfig(store.agentConfigs, target, credential, logger);

    expect(result.created).toBe(false);
    expect(result.config).toEqual(existing);
    const stored = await store.agentConfigs.get({ name: "migrate-to-hub2" });
    expect(stored?.metadata.resourceVersion).toBe(existing.metadata.resourceVersion);
    expect(stored?.spec.bootstrapCredentials?.secretRefs).toEqual([{ name: "earlier" }]);
  });

  it("propagates store errors", async () => {
    const failing: ResourceStore["agentConfigs"] = {
      ...store.agentConfigs,
      get: async () => {
        throw new Error("store unavailable");
      },
    };

    await expect(provisionTargetConfig(failing, target, credential, logger)).rejects.toThrow("store unavailable");
  });
});

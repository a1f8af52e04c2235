import { describe, it, expect, afterEach } from "vitest";
import { startHandoff, type HandoffInstance } from "../src/standalone.js";
import { resolveHandoffConfig } from "../src/config.js";
import { MIGRATION_FROM_EVENT } from "../src/migration/types.js";
import { createMemoryDatabase } from "../src/db/memory.js";
import { makeLogger } from "./helpers/fixtures.js";

let instance: HandoffInstance | null = null;

afterEach(() => {
  if (instance) {
    instance.stop();
    instance = null;
  }
});

describe("startHandoff (standalone)", () => {
  it("boots with an in-memory store", () => {
    const logger = makeLogger();
    instance = startHandoff({ config: resolveHandoffConfig({ hubName: "hub1" }), logger });

    expect(instance.config.hubName).toBe("hub1");
    expect(instance.db.backend).toBe("memory");
    expect(logger.info).toHaveBeenCalledWith("[handoff] Hub hub1 ready (memory store)");
  });

  it("registers the migration-from syncer", () => {
    instance = startHandoff({ config: resolveHandoffConfig({}), logger: makeLogger() });
    expect(instance.dispatcher.types()).toEqual([MIGRATION_FROM_EVENT]);
  });

  it("uses a supplied database", () => {
    const db = createMemoryDatabase();
    instance = startHandoff({ config: resolveHandoffConfig({}), logger: makeLogger(), db });
    expect(instance.db).toBe(db);
  });
});

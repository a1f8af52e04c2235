/**
 * Database factory: creates the appropriate backend based on config.
 */

export type {
  HandoffDatabase,
  ResourceStore,
  ResourceClient,
  AuditStore,
  AuditFilter,
} from "./interface.js";
export type { ResourceCodec } from "./codec.js";
export type { StoreErrorReason } from "./errors.js";
export { ResourceStoreError, isNotFound, isConflict, formatKey } from "./errors.js";
export { createMemoryDatabase, createMemoryResourceStore } from "./memory.js";
export { createSqliteDatabase } from "./sqlite.js";
export type { DatabaseBackend } from "../config.js";

import type { HandoffConfig } from "../config.js";
import type { HandoffDatabase } from "./interface.js";
import { createMemoryDatabase } from "./memory.js";
import { createSqliteDatabase } from "./sqlite.js";

export function createDatabase(config: HandoffConfig): HandoffDatabase {
  switch (config.dbBackend) {
    case "memory":
      return createMemoryDatabase();

    case "sqlite":
      return createSqliteDatabase(config.dataDir);
  }
}

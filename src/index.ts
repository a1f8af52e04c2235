/**
 * cluster-handoff: source-hub side of moving managed clusters between hubs.
 *
 * Provides:
 * - Migration-from protocol (credentials → agent config → annotations → detachment)
 * - Resource store abstraction with in-memory and SQLite backends
 * - Audit logging of preparation and detachment outcomes
 * - Event dispatch by event type
 */

export { startHandoff, type HandoffInstance, type StartHandoffOptions } from "./standalone.js";
export { createHandoffLogger, type HandoffLoggerOptions, type LogLevel } from "./logger.js";
export {
  loadHandoffConfig,
  resolveHandoffConfig,
  DEFAULT_POLL_INTERVAL_MS,
  type HandoffConfig,
  type DetachConfig,
  type DatabaseBackend,
} from "./config.js";
export {
  createDatabase,
  createMemoryDatabase,
  createMemoryResourceStore,
  createSqliteDatabase,
  ResourceStoreError,
  isNotFound,
  isConflict,
  type HandoffDatabase,
  type ResourceStore,
  type ResourceClient,
  type AuditStore,
  type AuditFilter,
  type StoreErrorReason,
} from "./db/index.js";
export { createAuditLog, type AuditLog } from "./audit/log.js";
export * from "./migration/index.js";
export type {
  Logger,
  ObjectMeta,
  ObjectKey,
  Resource,
  ResourceKind,
  BootstrapSecret,
  SecretRef,
  BootstrapCredentialsSpec,
  AgentConfig,
  AgentConfigSpec,
  Condition,
  ConditionStatus,
  ManagedCluster,
  ManagedClusterSpec,
  AuditEntry,
  AuditLevel,
} from "./types.js";

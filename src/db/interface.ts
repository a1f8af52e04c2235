/**
 * Database interface — backend-agnostic storage abstraction.
 *
 * Two halves:
 * - ResourceStore: the hub's versioned object store (secrets, agent configs,
 *   managed clusters). In production this is the hub's control-plane API; the
 *   bundled backends stand in for it locally.
 * - AuditStore: append-only local record of migration outcomes.
 *
 * Implementations:
 * - SQLite (built-in)
 * - In-memory (testing)
 */

import type {
  AgentConfig,
  AuditEntry,
  AuditLevel,
  BootstrapSecret,
  ManagedCluster,
  ObjectKey,
  Resource,
} from "../types.js";

// --- Resource store ---

/**
 * Per-kind client. Every call is independently consistent; there are no
 * multi-object transactions.
 *
 * Failures throw ResourceStoreError:
 * - create: AlreadyExists
 * - update: NotFound, or Conflict when metadata.resourceVersion is set and stale
 * - delete: NotFound
 */
export interface ResourceClient<T extends Resource> {
  /** Returns null when the object does not exist. */
  get(key: ObjectKey): Promise<T | null>;
  create(obj: T): Promise<T>;
  /** Replaces the stored object. Without resourceVersion the write is unconditional. */
  update(obj: T): Promise<T>;
  delete(key: ObjectKey): Promise<void>;
  list(): Promise<T[]>;
}

export interface ResourceStore {
  secrets: ResourceClient<BootstrapSecret>;
  agentConfigs: ResourceClient<AgentConfig>;
  managedClusters: ResourceClient<ManagedCluster>;
}

// --- Audit store ---

export interface AuditFilter {
  cluster?: string;
  action?: string;
  level?: AuditLevel;
  since?: number;
  limit?: number;
}

export interface AuditStore {
  insert(entry: AuditEntry): void;
  query(filter?: AuditFilter): AuditEntry[];
  count(filter?: AuditFilter): number;
}

// --- Unified database backend ---

export interface HandoffDatabase {
  readonly backend: string; // "sqlite" | "memory"

  resources: ResourceStore;
  audit: AuditStore;

  /** Run schema migrations. */
  migrate(): void;

  /** Graceful shutdown (close connections, flush buffers). */
  close(): void;
}

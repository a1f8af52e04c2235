/**
 * In-memory database backend.
 * For testing and development. No persistence.
 */

import type { AuditEntry, ObjectKey, Resource } from "../types.js";
import type {
  AuditFilter,
  AuditStore,
  HandoffDatabase,
  ResourceClient,
  ResourceStore,
} from "./interface.js";
import type { ResourceCodec } from "./codec.js";
import { agentConfigCodec, managedClusterCodec, secretCodec } from "./codec.js";
import { ResourceStoreError } from "./errors.js";

function matchesFilter<T>(record: T, filter: object | undefined): boolean {
  if (!filter) return true;
  for (const [key, value] of Object.entries(filter)) {
    if (value === undefined || value === null) continue;
    if (key === "limit" || key === "since") continue;
    if ((record as Record<string, unknown>)[key] !== value) return false;
  }
  return true;
}

function applyTimestamp<T extends { timestamp: number }>(
  records: T[],
  since?: number,
): T[] {
  if (!since) return records;
  return records.filter((r) => r.timestamp >= since);
}

function applyLimit<T>(records: T[], limit?: number): T[] {
  if (!limit) return records;
  return records.slice(-limit);
}

/** Normalize a key for the codec's scope. Cluster-scoped kinds ignore namespace. */
export function scopedKey(codec: { readonly namespaced: boolean }, key: ObjectKey): ObjectKey {
  return codec.namespaced
    ? { name: key.name, namespace: key.namespace ?? "" }
    : { name: key.name };
}

function storageKey(key: ObjectKey): string {
  return `${key.namespace ?? ""}/${key.name}`;
}

/** Shared revision counter, so versions are unique across kinds. */
interface Revision {
  next(): string;
}

function createMemoryResourceClient<T extends Resource>(
  codec: ResourceCodec<T>,
  revision: Revision,
): ResourceClient<T> {
  const store = new Map<string, T>();

  function stamp(obj: T, key: ObjectKey): T {
    const copy = codec.clone(obj);
    copy.metadata.name = key.name;
    if (key.namespace !== undefined) {
      copy.metadata.namespace = key.namespace;
    } else {
      delete copy.metadata.namespace;
    }
    copy.metadata.resourceVersion = revision.next();
    return copy;
  }

  return {
    async get(key) {
      const record = store.get(storageKey(scopedKey(codec, key)));
      return record ? codec.clone(record) : null;
    },

    async create(obj) {
      const key = scopedKey(codec, obj.metadata);
      if (!key.name) {
        throw new ResourceStoreError("Invalid", codec.kind, key, `${codec.kind}: metadata.name is required`);
      }
      const id = storageKey(key);
      if (store.has(id)) {
        throw new ResourceStoreError("AlreadyExists", codec.kind, key);
      }
      const stored = stamp(obj, key);
      store.set(id, stored);
      return codec.clone(stored);
    },

    async update(obj) {
      const key = scopedKey(codec, obj.metadata);
      const id = storageKey(key);
      const existing = store.get(id);
      if (!existing) {
        throw new ResourceStoreError("NotFound", codec.kind, key);
      }
      const expected = obj.metadata.resourceVersion;
      if (expected !== undefined && expected !== existing.metadata.resourceVersion) {
        throw new ResourceStoreError(
          "Conflict",
          codec.kind,
          key,
          `${codec.kind} ${key.name}: resourceVersion ${expected} is stale`,
        );
      }
      const stored = stamp(obj, key);
      store.set(id, stored);
      return codec.clone(stored);
    },

    async delete(key) {
      const scoped = scopedKey(codec, key);
      if (!store.delete(storageKey(scoped))) {
        throw new ResourceStoreError("NotFound", codec.kind, scoped);
      }
    },

    async list() {
      return Array.from(store.values()).map((r) => codec.clone(r));
    },
  };
}

export function createMemoryResourceStore(): ResourceStore {
  let counter = 0;
  const revision: Revision = { next: () => String(++counter) };

  return {
    secrets: createMemoryResourceClient(secretCodec, revision),
    agentConfigs: createMemoryResourceClient(agentConfigCodec, revision),
    managedClusters: createMemoryResourceClient(managedClusterCodec, revision),
  };
}

function createMemoryAuditStore(): AuditStore {
  const entries: AuditEntry[] = [];

  return {
    insert(entry) {
      entries.push({ ...entry });
    },
    query(filter?: AuditFilter) {
      let results = entries.filter((r) => matchesFilter(r, filter));
      results = applyTimestamp(results, filter?.since);
      return applyLimit(results, filter?.limit);
    },
    count(filter?: AuditFilter) {
      if (!filter) return entries.length;
      return applyTimestamp(entries.filter((r) => matchesFilter(r, filter)), filter.since).length;
    },
  };
}

export function createMemoryDatabase(): HandoffDatabase {
  return {
    backend: "memory",
    resources: createMemoryResourceStore(),
    audit: createMemoryAuditStore(),
    migrate() { /* no-op */ },
    close() { /* no-op */ },
  };
}

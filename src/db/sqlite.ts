/**
 * SQLite database backend using better-sqlite3.
 *
 * The resource half keeps every kind in one table keyed by
 * (kind, namespace, name) with a JSON body. A single revision counter stamps
 * resourceVersion on every write, the way a hub's object store does.
 */

import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import type { AuditEntry, ObjectKey, Resource } from "../types.js";
import { isAuditLevel } from "../types.js";
import type {
  AuditFilter,
  AuditStore,
  HandoffDatabase,
  ResourceClient,
  ResourceStore,
} from "./interface.js";
import type { ResourceCodec } from "./codec.js";
import { agentConfigCodec, isRecord, managedClusterCodec, secretCodec } from "./codec.js";
import { ResourceStoreError } from "./errors.js";
import { scopedKey } from "./memory.js";

// --- Schema ---

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS resources (
  kind TEXT NOT NULL,
  namespace TEXT NOT NULL DEFAULT '',
  name TEXT NOT NULL,
  resourceVersion INTEGER NOT NULL,
  body TEXT NOT NULL,
  PRIMARY KEY (kind, namespace, name)
);

CREATE TABLE IF NOT EXISTS store_meta (
  key TEXT PRIMARY KEY,
  value INTEGER NOT NULL
);

INSERT OR IGNORE INTO store_meta (key, value) VALUES ('revision', 0);

CREATE TABLE IF NOT EXISTS audit_entries (
  id TEXT PRIMARY KEY,
  timestamp INTEGER NOT NULL,
  hub TEXT NOT NULL,
  cluster TEXT,
  action TEXT NOT NULL,
  level TEXT NOT NULL,
  detail TEXT NOT NULL,
  result TEXT,
  duration INTEGER
);

CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON audit_entries(timestamp);
CREATE INDEX IF NOT EXISTS idx_audit_cluster ON audit_entries(cluster);
CREATE INDEX IF NOT EXISTS idx_audit_level ON audit_entries(level);
CREATE INDEX IF NOT EXISTS idx_audit_action ON audit_entries(action);
`;

// --- Row types (what SQLite returns) ---

interface ResourceRow {
  kind: string;
  namespace: string;
  name: string;
  resourceVersion: number;
  body: string;
}

interface AuditRow {
  id: string;
  timestamp: number;
  hub: string;
  cluster: string | null;
  action: string;
  level: string;
  detail: string;
  result: string | null;
  duration: number | null;
}

function rowToAudit(row: AuditRow): AuditEntry {
  return {
    id: row.id,
    timestamp: row.timestamp,
    hub: row.hub,
    cluster: row.cluster ?? undefined,
    action: row.action,
    level: isAuditLevel(row.level) ? row.level : "RED",
    detail: row.detail,
    result: row.result ?? undefined,
    duration: row.duration ?? undefined,
  };
}

// --- Store implementations ---

function createSqliteResourceClient<T extends Resource>(
  db: Database.Database,
  codec: ResourceCodec<T>,
): ResourceClient<T> {
  const stmts = {
    get: db.prepare(`SELECT * FROM resources WHERE kind = ? AND namespace = ? AND name = ?`),
    list: db.prepare(`SELECT * FROM resources WHERE kind = ? ORDER BY namespace, name`),
    insert: db.prepare(`
      INSERT INTO resources (kind, namespace, name, resourceVersion, body)
      VALUES (@kind, @namespace, @name, @resourceVersion, @body)
    `),
    replace: db.prepare(`
      UPDATE resources SET resourceVersion = @resourceVersion, body = @body
      WHERE kind = @kind AND namespace = @namespace AND name = @name
    `),
    remove: db.prepare(`DELETE FROM resources WHERE kind = ? AND namespace = ? AND name = ?`),
    bump: db.prepare(`UPDATE store_meta SET value = value + 1 WHERE key = 'revision' RETURNING value`),
  };

  function nextRevision(): number {
    const row = stmts.bump.get() as { value: number } | undefined;
    if (!row) throw new Error("store_meta revision row missing; run migrate() first");
    return row.value;
  }

  function rowToResource(row: ResourceRow): T {
    const obj = codec.fromJSON(JSON.parse(row.body));
    obj.metadata.resourceVersion = String(row.resourceVersion);
    return obj;
  }

  function findRow(key: ObjectKey): ResourceRow | undefined {
    return stmts.get.get(codec.kind, key.namespace ?? "", key.name) as ResourceRow | undefined;
  }

  function body(obj: T, key: ObjectKey): string {
    const json = codec.toJSON(obj);
    const meta = isRecord(json) ? json.metadata : undefined;
    if (isRecord(meta)) {
      meta.name = key.name;
      delete meta.resourceVersion;
      if (key.namespace !== undefined) {
        meta.namespace = key.namespace;
      } else {
        delete meta.namespace;
      }
    }
    return JSON.stringify(json);
  }

  const create = db.transaction((obj: T): T => {
    const key = scopedKey(codec, obj.metadata);
    if (!key.name) {
      throw new ResourceStoreError("Invalid", codec.kind, key, `${codec.kind}: metadata.name is required`);
    }
    if (findRow(key)) {
      throw new ResourceStoreError("AlreadyExists", codec.kind, key);
    }
    const row: ResourceRow = {
      kind: codec.kind,
      namespace: key.namespace ?? "",
      name: key.name,
      resourceVersion: nextRevision(),
      body: body(obj, key),
    };
    stmts.insert.run(row);
    return rowToResource(row);
  });

  const update = db.transaction((obj: T): T => {
    const key = scopedKey(codec, obj.metadata);
    const existing = findRow(key);
    if (!existing) {
      throw new ResourceStoreError("NotFound", codec.kind, key);
    }
    const expected = obj.metadata.resourceVersion;
    if (expected !== undefined && expected !== String(existing.resourceVersion)) {
      throw new ResourceStoreError(
        "Conflict",
        codec.kind,
        key,
        `${codec.kind} ${key.name}: resourceVersion ${expected} is stale`,
      );
    }
    const row: ResourceRow = {
      kind: codec.kind,
      namespace: key.namespace ?? "",
      name: key.name,
      resourceVersion: nextRevision(),
      body: body(obj, key),
    };
    stmts.replace.run(row);
    return rowToResource(row);
  });

  return {
    async get(key) {
      const row = findRow(scopedKey(codec, key));
      return row ? rowToResource(row) : null;
    },

    async create(obj) {
      return create(obj);
    },

    async update(obj) {
      return update(obj);
    },

    async delete(key) {
      const scoped = scopedKey(codec, key);
      const info = stmts.remove.run(codec.kind, scoped.namespace ?? "", scoped.name);
      if (info.changes === 0) {
        throw new ResourceStoreError("NotFound", codec.kind, scoped);
      }
    },

    async list() {
      const rows = stmts.list.all(codec.kind) as ResourceRow[];
      return rows.map(rowToResource);
    },
  };
}

function createSqliteResourceStore(db: Database.Database): ResourceStore {
  return {
    secrets: createSqliteResourceClient(db, secretCodec),
    agentConfigs: createSqliteResourceClient(db, agentConfigCodec),
    managedClusters: createSqliteResourceClient(db, managedClusterCodec),
  };
}

function createSqliteAuditStore(db: Database.Database): AuditStore {
  const insertStmt = db.prepare(`
    INSERT INTO audit_entries (id, timestamp, hub, cluster, action, level, detail, result, duration)
    VALUES (@id, @timestamp, @hub, @cluster, @action, @level, @detail, @result, @duration)
  `);

  function whereClause(filter: AuditFilter | undefined, values: Record<string, unknown>): string {
    const conditions: string[] = [];

    if (filter?.cluster) {
      conditions.push("cluster = @cluster");
      values.cluster = filter.cluster;
    }
    if (filter?.action) {
      conditions.push("action = @action");
      values.action = filter.action;
    }
    if (filter?.level) {
      conditions.push("level = @level");
      values.level = filter.level;
    }
    if (filter?.since) {
      conditions.push("timestamp >= @since");
      values.since = filter.since;
    }

    return conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
  }

  return {
    insert(entry) {
      insertStmt.run({
        id: entry.id,
        timestamp: entry.timestamp,
        hub: entry.hub,
        cluster: entry.cluster ?? null,
        action: entry.action,
        level: entry.level,
        detail: entry.detail,
        result: entry.result ?? null,
        duration: entry.duration ?? null,
      });
    },

    query(filter?: AuditFilter) {
      const values: Record<string, unknown> = {};
      const where = whereClause(filter, values);

      // Most recent `limit` entries, returned oldest first
      let sql = `SELECT * FROM audit_entries ${where} ORDER BY timestamp ASC, rowid ASC`;
      if (filter?.limit) {
        values._limit = Math.floor(filter.limit);
        sql = `SELECT * FROM (SELECT *, rowid AS _rid FROM audit_entries ${where} ORDER BY timestamp DESC, rowid DESC LIMIT @_limit) ORDER BY timestamp ASC, _rid ASC`;
      }

      const rows = db.prepare(sql).all(values) as AuditRow[];
      return rows.map(rowToAudit);
    },

    count(filter?: AuditFilter) {
      const values: Record<string, unknown> = {};
      const where = whereClause(filter, values);
      const row = db.prepare(`SELECT COUNT(*) AS count FROM audit_entries ${where}`).get(values) as { count: number };
      return row.count;
    },
  };
}

// --- Database factory ---

export function createSqliteDatabase(dataDir: string): HandoffDatabase {
  // Ensure data directory exists
  fs.mkdirSync(dataDir, { recursive: true });

  const dbPath = path.join(dataDir, "handoff.db");
  const db = new Database(dbPath);

  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");

  let resources: ResourceStore | null = null;
  let audit: AuditStore | null = null;

  return {
    backend: "sqlite",

    get resources() {
      if (!resources) resources = createSqliteResourceStore(db);
      return resources;
    },
    get audit() {
      if (!audit) audit = createSqliteAuditStore(db);
      return audit;
    },

    migrate() {
      db.exec(SCHEMA_SQL);
      resources = null;
      audit = null;
    },

    close() {
      db.close();
    },
  };
}

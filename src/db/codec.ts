/**
 * Per-kind resource codecs.
 *
 * Backends share these to copy objects in and out of storage so callers never
 * hold a reference into the store, and to turn stored JSON back into typed
 * resources.
 */

import type {
  AgentConfig,
  AgentConfigSpec,
  BootstrapSecret,
  Condition,
  ManagedCluster,
  ObjectMeta,
  Resource,
  ResourceKind,
  SecretRef,
} from "../types.js";

export interface ResourceCodec<T extends Resource> {
  readonly kind: ResourceKind;
  readonly namespaced: boolean;
  clone(obj: T): T;
  /** JSON-safe form. Buffers become base64 strings. */
  toJSON(obj: T): unknown;
  /** Inverse of toJSON. Throws on a record that does not match the kind. */
  fromJSON(raw: unknown): T;
}

// --- Guards ---

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Map a record's values into a new record. Keys are defined as own properties,
 * so a key such as "__proto__" is stored rather than treated as a prototype.
 */
export function mapValues<A, B>(record: Record<string, A>, fn: (value: A) => B): Record<string, B> {
  return Object.fromEntries(Object.entries(record).map(([k, v]): [string, B] => [k, fn(v)]));
}

function stringMap(v: unknown): Record<string, string> | undefined {
  if (!isRecord(v)) return undefined;
  return Object.fromEntries(
    Object.entries(v).filter((entry): entry is [string, string] => typeof entry[1] === "string"),
  );
}

function corrupt(kind: ResourceKind, why: string): Error {
  return new Error(`corrupt ${kind} record: ${why}`);
}

function cloneMeta(meta: ObjectMeta): ObjectMeta {
  const out: ObjectMeta = { name: meta.name };
  if (meta.namespace !== undefined) out.namespace = meta.namespace;
  if (meta.resourceVersion !== undefined) out.resourceVersion = meta.resourceVersion;
  if (meta.annotations) out.annotations = { ...meta.annotations };
  if (meta.labels) out.labels = { ...meta.labels };
  return out;
}

function metaFromJSON(kind: ResourceKind, raw: unknown): ObjectMeta {
  if (!isRecord(raw) || typeof raw.name !== "string") {
    throw corrupt(kind, "metadata.name missing");
  }
  const meta: ObjectMeta = { name: raw.name };
  if (typeof raw.namespace === "string") meta.namespace = raw.namespace;
  if (typeof raw.resourceVersion === "string") meta.resourceVersion = raw.resourceVersion;
  const annotations = stringMap(raw.annotations);
  if (annotations) meta.annotations = annotations;
  const labels = stringMap(raw.labels);
  if (labels) meta.labels = labels;
  return meta;
}

// --- Secrets ---

export const secretCodec: ResourceCodec<BootstrapSecret> = {
  kind: "Secret",
  namespaced: true,

  clone(obj) {
    return { metadata: cloneMeta(obj.metadata), data: mapValues(obj.data, (v) => Buffer.from(v)) };
  },

  toJSON(obj) {
    return { metadata: cloneMeta(obj.metadata), data: mapValues(obj.data, (v) => v.toString("base64")) };
  },

  fromJSON(raw) {
    if (!isRecord(raw)) throw corrupt("Secret", "not an object");
    const data = mapValues(stringMap(raw.data) ?? {}, (v) => Buffer.from(v, "base64"));
    return { metadata: metaFromJSON("Secret", raw.metadata), data };
  },
};

// --- Agent configs ---

function cloneAgentSpec(spec: AgentConfigSpec): AgentConfigSpec {
  const out: AgentConfigSpec = {};
  if (spec.hubAddress !== undefined) out.hubAddress = spec.hubAddress;
  if (spec.bootstrapCredentials) {
    out.bootstrapCredentials = {
      type: spec.bootstrapCredentials.type,
      secretRefs: spec.bootstrapCredentials.secretRefs.map((ref) => ({ name: ref.name })),
    };
  }
  return out;
}

export const agentConfigCodec: ResourceCodec<AgentConfig> = {
  kind: "AgentConfig",
  namespaced: false,

  clone(obj) {
    return { metadata: cloneMeta(obj.metadata), spec: cloneAgentSpec(obj.spec) };
  },

  toJSON(obj) {
    return agentConfigCodec.clone(obj);
  },

  fromJSON(raw) {
    if (!isRecord(raw)) throw corrupt("AgentConfig", "not an object");
    const specRaw = isRecord(raw.spec) ? raw.spec : {};
    const spec: AgentConfigSpec = {};
    if (typeof specRaw.hubAddress === "string") spec.hubAddress = specRaw.hubAddress;
    const creds = specRaw.bootstrapCredentials;
    if (isRecord(creds) && Array.isArray(creds.secretRefs)) {
      const secretRefs: SecretRef[] = [];
      for (const ref of creds.secretRefs) {
        if (isRecord(ref) && typeof ref.name === "string") secretRefs.push({ name: ref.name });
      }
      spec.bootstrapCredentials = { type: "LocalSecrets", secretRefs };
    }
    return { metadata: metaFromJSON("AgentConfig", raw.metadata), spec };
  },
};

// --- Managed clusters ---

function isConditionStatus(v: unknown): v is Condition["status"] {
  return v === "True" || v === "False" || v === "Unknown";
}

export const managedClusterCodec: ResourceCodec<ManagedCluster> = {
  kind: "ManagedCluster",
  namespaced: false,

  clone(obj) {
    return {
      metadata: cloneMeta(obj.metadata),
      spec: { hubAcceptsClient: obj.spec.hubAcceptsClient },
      status: { conditions: obj.status.conditions.map((c) => ({ ...c })) },
    };
  },

  toJSON(obj) {
    return managedClusterCodec.clone(obj);
  },

  fromJSON(raw) {
    if (!isRecord(raw)) throw corrupt("ManagedCluster", "not an object");
    const spec = isRecord(raw.spec) ? raw.spec : {};
    const status = isRecord(raw.status) ? raw.status : {};
    const conditions: Condition[] = [];
    if (Array.isArray(status.conditions)) {
      for (const c of status.conditions) {
        if (!isRecord(c) || typeof c.type !== "string" || !isConditionStatus(c.status)) continue;
        const condition: Condition = { type: c.type, status: c.status };
        if (typeof c.reason === "string") condition.reason = c.reason;
        if (typeof c.message === "string") condition.message = c.message;
        if (typeof c.lastTransitionTime === "string") condition.lastTransitionTime = c.lastTransitionTime;
        conditions.push(condition);
      }
    }
    return {
      metadata: metaFromJSON("ManagedCluster", raw.metadata),
      spec: { hubAcceptsClient: spec.hubAcceptsClient === true },
      status: { conditions },
    };
  },
};

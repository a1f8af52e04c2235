/**
 * Shared types for cluster-handoff.
 *
 * Resource shapes mirror the hub's control-plane objects closely enough for
 * the migration-from protocol: object metadata, bootstrap secrets, agent
 * configs and managed clusters with status conditions.
 */

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug?(msg: string): void;
}

// --- Resources ---

export interface ObjectMeta {
  name: string;
  /** Absent for cluster-scoped kinds. */
  namespace?: string;
  /** Store-assigned version. Set on every object a store returns. */
  resourceVersion?: string;
  annotations?: Record<string, string>;
  labels?: Record<string, string>;
}

/** Address of a stored object. */
export interface ObjectKey {
  name: string;
  namespace?: string;
}

export interface Resource {
  metadata: ObjectMeta;
}

/** Opaque credential material an agent uses to register with a hub. */
export interface BootstrapSecret extends Resource {
  data: Record<string, Buffer>;
}

export interface SecretRef {
  name: string;
}

export interface BootstrapCredentialsSpec {
  type: "LocalSecrets";
  /** Tried in order by the agent. */
  secretRefs: SecretRef[];
}

export interface AgentConfigSpec {
  /** Address of the hub the agent should register with next. */
  hubAddress?: string;
  bootstrapCredentials?: BootstrapCredentialsSpec;
}

/** Cluster-scoped descriptor telling an agent which bootstrap secrets to trust. */
export interface AgentConfig extends Resource {
  spec: AgentConfigSpec;
}

export type ConditionStatus = "True" | "False" | "Unknown";

export interface Condition {
  type: string;
  status: ConditionStatus;
  reason?: string;
  message?: string;
  lastTransitionTime?: string;
}

export interface ManagedClusterSpec {
  hubAcceptsClient: boolean;
}

export interface ManagedCluster extends Resource {
  spec: ManagedClusterSpec;
  status: {
    conditions: Condition[];
  };
}

export type ResourceKind = "Secret" | "AgentConfig" | "ManagedCluster";

// --- Audit ---

export type AuditLevel = "GREEN" | "YELLOW" | "RED";

export function isAuditLevel(v: unknown): v is AuditLevel {
  return v === "GREEN" || v === "YELLOW" || v === "RED";
}

export interface AuditEntry {
  id: string;
  timestamp: number;
  /** Hub that recorded the entry. */
  hub: string;
  /** Managed cluster the entry is about, if a single one. */
  cluster?: string;
  action: string;
  level: AuditLevel;
  detail: string;
  result?: string;
  duration?: number;
}

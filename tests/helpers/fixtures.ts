import { vi } from "vitest";
import type { ConditionStatus, Logger, ManagedCluster } from "../../src/types.js";
import { CONDITION_AVAILABLE } from "../../src/migration/types.js";

export function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export function makeCluster(
  name: string,
  available: ConditionStatus = "True",
  annotations?: Record<string, string>,
): ManagedCluster {
  return {
    metadata: annotations ? { name, annotations } : { name },
    spec: { hubAcceptsClient: true },
    status: {
      conditions: [{ type: CONDITION_AVAILABLE, status: available, reason: "Test" }],
    },
  };
}

export interface PayloadParts {
  secretName?: string;
  namespace?: string;
  data?: Record<string, string>;
  configName?: string;
  hubAddress?: string;
  clusters?: string[];
}

/** Build a migration-from payload. `data` values are plain text, encoded here. */
export function makePayload(parts: PayloadParts = {}): string {
  const data: Record<string, string> = {};
  for (const [k, v] of Object.entries(parts.data ?? { kubeconfig: "test-kubeconfig" })) {
    data[k] = Buffer.from(v, "utf8").toString("base64");
  }
  return JSON.stringify({
    bootstrapSecret: {
      metadata: {
        name: parts.secretName ?? "bootstrap-hub2",
        namespace: parts.namespace ?? "handoff-agent",
      },
      data,
    },
    agentConfig: {
      metadata: { name: parts.configName ?? "migrate-to-hub2" },
      spec: parts.hubAddress ? { hubAddress: parts.hubAddress } : {},
    },
    managedClusters: parts.clusters ?? ["c1", "c2"],
  });
}

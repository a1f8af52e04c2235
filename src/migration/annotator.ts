/**
 * Membership annotation: marks each managed cluster as migrating to the
 * target agent config.
 *
 * A cluster already carrying the marker for the same config is skipped without
 * a write, so a redelivered instruction resumes where a failed one stopped.
 */

import type { Logger, ManagedCluster } from "../types.js";
import type { ResourceClient } from "../db/index.js";
import { ResourceStoreError } from "../db/index.js";
import type { AnnotateResult } from "./types.js";
import { ANNOTATION_AGENT_CONFIG, ANNOTATION_MIGRATING } from "./types.js";

/** True when the cluster is already announced for `configName`. */
export function isAnnouncedFor(cluster: ManagedCluster, configName: string): boolean {
  const annotations = cluster.metadata.annotations ?? {};
  return ANNOTATION_MIGRATING in annotations
    && annotations[ANNOTATION_AGENT_CONFIG] === configName;
}

/**
 * Annotate clusters in order. A missing cluster, or any store error, aborts the
 * batch; clusters annotated before the failure stay annotated.
 */
export async function annotateClusters(
  clusters: ResourceClient<ManagedCluster>,
  clusterNames: readonly string[],
  configName: string,
  logger: Logger,
): Promise<AnnotateResult> {
  const result: AnnotateResult = { annotated: [], skipped: [] };

  for (const name of clusterNames) {
    const cluster = await clusters.get({ name });
    if (!cluster) {
      throw new ResourceStoreError("NotFound", "ManagedCluster", { name });
    }

    if (isAnnouncedFor(cluster, configName)) {
      result.skipped.push(name);
      continue;
    }

    cluster.metadata.annotations = {
      ...cluster.metadata.annotations,
      [ANNOTATION_AGENT_CONFIG]: configName,
      [ANNOTATION_MIGRATING]: "",
    };
    // Optimistic write: the fetched resourceVersion rides along
    await clusters.update(cluster);
    logger.info(`[handoff:migration:annotate] ${name}: migrating to agent config ${configName}`);
    result.annotated.push(name);
  }

  return result;
}

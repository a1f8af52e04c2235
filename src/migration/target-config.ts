/**
 * Target-config provisioning.
 *
 * First writer wins: an existing agent config of the same name is left exactly
 * as it is, even if its secret references differ.
 */

import type { AgentConfig, BootstrapSecret, Logger } from "../types.js";
import type { ResourceClient } from "../db/index.js";
import type { ProvisionResult } from "./types.js";
import { backupSecretName } from "./types.js";

/**
 * Point the config at `[primary, backup]` and create it if it does not exist.
 *
 * References are by name only; the config is cluster-scoped and agents look
 * the secrets up in their well-known namespace.
 */
export async function provisionTargetConfig(
  configs: ResourceClient<AgentConfig>,
  targetConfig: AgentConfig,
  credential: BootstrapSecret,
  logger: Logger,
): Promise<ProvisionResult> {
  const primaryName = credential.metadata.name;
  const desired: AgentConfig = {
    metadata: { name: targetConfig.metadata.name },
    spec: {
      ...targetConfig.spec,
      bootstrapCredentials: {
        type: "LocalSecrets",
        secretRefs: [{ name: primaryName }, { name: backupSecretName(primaryName) }],
      },
    },
  };

  const found = await configs.get({ name: desired.metadata.name });
  if (found) {
    logger.debug?.(`[handoff:migration:config] Agent config ${desired.metadata.name} already exists, leaving it unchanged`);
    return { config: found, created: false };
  }

  logger.info(`[handoff:migration:config] Creating agent config ${desired.metadata.name}`);
  const config = await configs.create(desired);
  return { config, created: true };
}

/**
 * Credential propagation: upserts the primary bootstrap secret and its
 * "-backup" twin.
 *
 * Both objects get the instruction's data verbatim. The backup is built from
 * the instruction, never re-read from the store, so it does not depend on the
 * state of the primary just written.
 */

import type { BootstrapSecret, Logger } from "../types.js";
import type { ResourceClient } from "../db/index.js";
import { formatKey } from "../db/index.js";
import { mapValues } from "../db/codec.js";
import type { PropagatedCredentials } from "./types.js";
import { backupSecretName } from "./types.js";

function copyData(data: Record<string, Buffer>): Record<string, Buffer> {
  return mapValues(data, (v) => Buffer.from(v));
}

/**
 * Create the secret, or overwrite the data of an existing one.
 * Overwrite is a replacement, not a merge: keys absent from `desired` are dropped.
 */
async function upsertSecret(
  secrets: ResourceClient<BootstrapSecret>,
  desired: BootstrapSecret,
  logger: Logger,
): Promise<BootstrapSecret> {
  const key = { name: desired.metadata.name, namespace: desired.metadata.namespace };
  const found = await secrets.get(key);

  if (!found) {
    logger.info(`[handoff:migration:credentials] Creating bootstrap secret ${formatKey(key)}`);
    return secrets.create(desired);
  }

  logger.info(`[handoff:migration:credentials] Updating bootstrap secret ${formatKey(key)}`);
  return secrets.update({
    metadata: { ...found.metadata, resourceVersion: undefined },
    data: copyData(desired.data),
  });
}

/**
 * Upsert the primary bootstrap secret and its backup.
 *
 * Repeatable: running it again with the same credential converges to the same
 * stored data. Any store error other than not-found on the initial fetch
 * propagates.
 */
export async function propagateCredentials(
  secrets: ResourceClient<BootstrapSecret>,
  credential: BootstrapSecret,
  logger: Logger,
): Promise<PropagatedCredentials> {
  const primaryDesired: BootstrapSecret = {
    metadata: { name: credential.metadata.name, namespace: credential.metadata.namespace },
    data: copyData(credential.data),
  };
  const backupDesired: BootstrapSecret = {
    metadata: {
      name: backupSecretName(credential.metadata.name),
      namespace: credential.metadata.namespace,
    },
    data: copyData(credential.data),
  };

  const primary = await upsertSecret(secrets, primaryDesired, logger);
  const backup = await upsertSecret(secrets, backupDesired, logger);

  return { primary, backup };
}

/**
 * Canary spawner: clones the primary Deployment into a canary-track Deployment.
 * Everything in the primary's spec is inherited except track labels, replicas and the image tag.
 */

import type { V1Deployment } from "@kubernetes/client-node";
import type { ClusterGateway } from "./gateway/types.js";
import {
  APP_LABEL,
  CANARY_TRACK,
  MANAGED_ANNOTATION,
  TRACK_LABEL,
  type OperationOptions,
  type Workload,
} from "./types.js";
import { InvalidTagError, MalformedWorkloadError } from "./errors.js";
import { withSignal } from "./abort.js";
import { toWorkload } from "./stateProjector.js";
import { canaryName, randomToken } from "./nameGenerator.js";
import { createLogger } from "../../utils/logger.js";

const log = createLogger("CanarySpawner");

export interface SpawnCanaryOptions extends OperationOptions {
  /** Token source for the generated name; defaults to the adjective-noun generator. */
  nameToken?: () => string;
}

/**
 * Replaces everything after the first `:` with `tag`; a reference without `:` gets `:tag` appended.
 */
export function overrideImageTag(image: string, tag: string): string {
  const idx = image.indexOf(":");
  const repo = idx === -1 ? image : image.slice(0, idx);
  return `${repo}:${tag}`;
}

/**
 * Builds the canary object from the primary. The track label is written to the object labels,
 * the selector matchLabels and the pod template labels; the API server rejects a mismatch.
 */
export function buildCanaryDeployment(
  primary: V1Deployment,
  applicationName: string,
  name: string,
  imageTag: string,
  replicaCount: number
): V1Deployment {
  const primaryName = primary.metadata?.name ?? applicationName;
  if (!primary.spec) throw new MalformedWorkloadError(primaryName);
  const spec = structuredClone(primary.spec);
  const container = spec.template.spec?.containers[0];
  if (!container) throw new MalformedWorkloadError(primaryName);

  spec.selector.matchLabels = { ...spec.selector.matchLabels, [TRACK_LABEL]: CANARY_TRACK };
  spec.template.metadata = {
    ...spec.template.metadata,
    labels: { ...spec.template.metadata?.labels, [TRACK_LABEL]: CANARY_TRACK },
  };
  spec.replicas = replicaCount;
  container.image = overrideImageTag(container.image ?? "", imageTag);

  return {
    apiVersion: "apps/v1",
    kind: "Deployment",
    metadata: {
      name,
      labels: { [APP_LABEL]: applicationName, [TRACK_LABEL]: CANARY_TRACK },
      annotations: { [MANAGED_ANNOTATION]: "true" },
    },
    spec,
  };
}

export async function spawnCanary(
  gateway: ClusterGateway,
  applicationName: string,
  imageTag: string,
  replicaCount: number,
  opts: SpawnCanaryOptions = {}
): Promise<Workload> {
  const { signal } = opts;
  const tag = imageTag.trim();
  if (tag === "") throw new InvalidTagError(imageTag);

  const primary = await withSignal(() => gateway.getDeployment(applicationName, { signal }), signal);
  const name = canaryName(applicationName, (opts.nameToken ?? randomToken)());
  const canary = buildCanaryDeployment(primary, applicationName, name, tag, replicaCount);

  const created = await withSignal(() => gateway.createDeployment(canary, { signal }), signal);
  log.info(`created ${name} (${canary.spec?.template.spec?.containers[0]?.image}, replicas=${replicaCount})`);
  return toWorkload(created);
}

/**
 * State projector: folds Deployments, the Service and its Endpoints into one AppState.
 * Recomputed from the cluster on every call; any failed read fails the whole projection.
 */

import type { V1Deployment, V1Endpoints, V1Service } from "@kubernetes/client-node";
import type { ClusterGateway } from "./gateway/types.js";
import {
  APP_LABEL,
  MAIN_TRACK,
  MANAGED_ANNOTATION,
  TRACK_LABEL,
  type AppState,
  type Endpoint,
  type OperationOptions,
  type Workload,
} from "./types.js";
import { MalformedWorkloadError } from "./errors.js";
import { withSignal } from "./abort.js";

const TRUE_STRINGS = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_STRINGS = new Set(["0", "f", "F", "FALSE", "false", "False"]);

/** Strict boolean parse; null when the value is missing or not a recognized boolean string. */
export function parseBool(value: string | undefined): boolean | null {
  if (value == null) return null;
  if (TRUE_STRINGS.has(value)) return true;
  if (FALSE_STRINGS.has(value)) return false;
  return null;
}

/** Opted in via a well-formed true marker and carrying a non-empty track label. */
export function isManagedWorkload(deployment: V1Deployment): boolean {
  const marker = parseBool(deployment.metadata?.annotations?.[MANAGED_ANNOTATION]);
  if (marker !== true) return false;
  const track = deployment.metadata?.labels?.[TRACK_LABEL];
  return track != null && track !== "";
}

export function toWorkload(deployment: V1Deployment): Workload {
  const name = deployment.metadata?.name ?? "";
  const container = deployment.spec?.template.spec?.containers[0];
  if (!container) throw new MalformedWorkloadError(name);
  return {
    name,
    image: container.image ?? "",
    track: deployment.metadata?.labels?.[TRACK_LABEL] ?? "",
    replicas: deployment.spec?.replicas ?? 1,
    availableReplicas: deployment.status?.availableReplicas ?? 0,
  };
}

/** Only `track: main` pins traffic; an absent key or any other value lets every track through. */
export function isCanaryEnabled(service: V1Service): boolean {
  return service.spec?.selector?.[TRACK_LABEL] !== MAIN_TRACK;
}

export function toEndpoints(endpoints: V1Endpoints): Endpoint[] {
  const addresses = endpoints.subsets?.[0]?.addresses ?? [];
  return addresses.map((a) => ({
    targetInstance: a.targetRef?.name ?? "",
    address: a.ip,
  }));
}

export function appLabelSelector(applicationName: string): string {
  return `${APP_LABEL}=${applicationName}`;
}

export async function projectAppState(
  gateway: ClusterGateway,
  applicationName: string,
  opts: OperationOptions = {}
): Promise<AppState> {
  const { signal } = opts;
  const listed = await withSignal(
    () => gateway.listDeployments(appLabelSelector(applicationName), { signal }),
    signal
  );
  const deployments = listed.filter(isManagedWorkload).map(toWorkload);

  const endpoints = await withSignal(() => gateway.getEndpoints(applicationName, { signal }), signal);
  const service = await withSignal(() => gateway.getService(applicationName, { signal }), signal);

  return {
    canaryEnabled: isCanaryEnabled(service),
    deployments,
    endpoints: toEndpoints(endpoints),
  };
}

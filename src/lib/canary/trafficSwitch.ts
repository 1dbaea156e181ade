/**
 * Traffic switch: toggles the `track` key of the Service selector, then waits for the
 * endpoints controller to follow before returning fresh state.
 *
 * The endpoints controller reconciles asynchronously, so state is re-read until the endpoint
 * list matches the new selector or the settle timeout elapses. On timeout the last read is
 * returned as-is and may still show stale endpoints.
 */

import type { ClusterGateway, SelectorPatch } from "./gateway/types.js";
import {
  MAIN_TRACK,
  TRACK_LABEL,
  type AppState,
  type OperationOptions,
  type TrafficSettleOptions,
  type Workload,
} from "./types.js";
import { delay, withSignal } from "./abort.js";
import { projectAppState } from "./stateProjector.js";
import { createLogger } from "../../utils/logger.js";

const log = createLogger("TrafficSwitch");

export const DEFAULT_SETTLE_OPTIONS: TrafficSettleOptions = {
  pollIntervalMs: 100,
  settleTimeoutMs: 2_000,
};

export interface SetCanaryTrafficOptions extends OperationOptions {
  settle?: Partial<TrafficSettleOptions>;
}

/** Enabled: drop the track key so the selector matches every track. Disabled: pin to main. */
export function selectorPatchFor(enabled: boolean): SelectorPatch {
  return enabled
    ? { op: "remove", key: TRACK_LABEL }
    : { op: "add", key: TRACK_LABEL, value: MAIN_TRACK };
}

/**
 * Pod names are `<deployment>-<hash>-<suffix>`; the owner is the longest deployment name
 * that prefixes the pod name.
 */
export function owningWorkload(podName: string, deployments: Workload[]): Workload | undefined {
  let owner: Workload | undefined;
  for (const d of deployments) {
    if (!podName.startsWith(`${d.name}-`)) continue;
    if (!owner || d.name.length > owner.name.length) owner = d;
  }
  return owner;
}

/** Whether the endpoint list reflects the selector the patch just wrote. */
export function hasConverged(state: AppState, enabled: boolean): boolean {
  if (!enabled) {
    // Endpoints owned by no managed workload are not ours to judge.
    return state.endpoints.every((e) => {
      const owner = owningWorkload(e.targetInstance, state.deployments);
      return !owner || owner.track === MAIN_TRACK;
    });
  }
  const served = new Set(
    state.endpoints
      .map((e) => owningWorkload(e.targetInstance, state.deployments)?.name)
      .filter((n): n is string => n != null)
  );
  return state.deployments
    .filter((d) => d.track !== MAIN_TRACK && d.availableReplicas > 0)
    .every((d) => served.has(d.name));
}

export async function waitForConvergence(
  gateway: ClusterGateway,
  applicationName: string,
  enabled: boolean,
  settle: TrafficSettleOptions,
  opts: OperationOptions = {}
): Promise<AppState> {
  const { signal } = opts;
  const deadline = Date.now() + settle.settleTimeoutMs;
  let state = await projectAppState(gateway, applicationName, { signal });
  let attempts = 1;
  while (!hasConverged(state, enabled)) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      log.warn(
        `endpoints for ${applicationName} did not converge within ${settle.settleTimeoutMs}ms (${attempts} reads); returning last state`
      );
      return state;
    }
    await delay(Math.min(settle.pollIntervalMs, remaining), signal);
    state = await projectAppState(gateway, applicationName, { signal });
    attempts++;
  }
  log.debug(`endpoints for ${applicationName} converged after ${attempts} reads`);
  return state;
}

export async function setCanaryTraffic(
  gateway: ClusterGateway,
  applicationName: string,
  enabled: boolean,
  opts: SetCanaryTrafficOptions = {}
): Promise<AppState> {
  const { signal } = opts;
  const settle: TrafficSettleOptions = { ...DEFAULT_SETTLE_OPTIONS, ...opts.settle };
  const patch = selectorPatchFor(enabled);

  await withSignal(() => gateway.patchServiceSelector(applicationName, patch, { signal }), signal);
  log.info(`${applicationName}: canary traffic ${enabled ? "enabled" : "disabled"}`);

  return waitForConvergence(gateway, applicationName, enabled, settle, { signal });
}

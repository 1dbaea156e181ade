/**
 * Canary: state projection, canary spawning and traffic switching over a cluster gateway.
 */

export type {
  AppState,
  Endpoint,
  Workload,
  OperationOptions,
  TrafficSettleOptions,
} from "./types.js";
export {
  APP_LABEL,
  TRACK_LABEL,
  MANAGED_ANNOTATION,
  MAIN_TRACK,
  CANARY_TRACK,
} from "./types.js";

export {
  CanarySwitchError,
  NotFoundError,
  MalformedWorkloadError,
  InvalidTagError,
  GatewayError,
  CancelledError,
} from "./errors.js";
export type { CanaryErrorCode } from "./errors.js";

export type { ClusterGateway, SelectorPatch } from "./gateway/types.js";
export { KubeClusterGateway } from "./gateway/kubeGateway.js";
export type { KubeGatewayConfig } from "./gateway/kubeGateway.js";

export { projectAppState, parseBool } from "./stateProjector.js";
export { spawnCanary, overrideImageTag } from "./canarySpawner.js";
export type { SpawnCanaryOptions } from "./canarySpawner.js";
export { setCanaryTraffic, selectorPatchFor, DEFAULT_SETTLE_OPTIONS } from "./trafficSwitch.js";
export type { SetCanaryTrafficOptions } from "./trafficSwitch.js";
export { listApplications } from "./applications.js";
export { CanaryService } from "./canaryService.js";

export {
  getPort,
  getNamespace,
  getKubeconfigPath,
  getKubeContext,
  getTrafficSettleOptions,
} from "./config.js";

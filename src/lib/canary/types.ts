/**
 * Canary topology types and the label/annotation convention shared with the cluster.
 */

/** Label grouping every object of one application. */
export const APP_LABEL = "app";

/** Label partitioning an application's workloads into routing groups. */
export const TRACK_LABEL = "track";

/** Opt-in marker annotation; value is a boolean string. */
export const MANAGED_ANNOTATION = "devops-tool-htmx";

export const MAIN_TRACK = "main";
export const CANARY_TRACK = "canary";

export interface Workload {
  name: string;
  /** Container image reference, `repo[:tag]` */
  image: string;
  track: string;
  replicas: number;
  availableReplicas: number;
}

export interface Endpoint {
  targetInstance: string;
  address: string;
}

export interface AppState {
  canaryEnabled: boolean;
  deployments: Workload[];
  endpoints: Endpoint[];
}

/** Cancellation for any operation that reaches the cluster. */
export interface OperationOptions {
  signal?: AbortSignal;
}

/** Post-patch convergence wait for the traffic switch. */
export interface TrafficSettleOptions {
  pollIntervalMs: number;
  /** 0 disables polling: a single read right after the patch */
  settleTimeoutMs: number;
}

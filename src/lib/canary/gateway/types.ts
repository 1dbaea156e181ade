/**
 * Cluster gateway interface. All calls are scoped to the gateway's namespace.
 */

import type { V1Deployment, V1Endpoints, V1Service } from "@kubernetes/client-node";
import type { OperationOptions } from "../types.js";

/** Targeted change to one key of a Service's label selector. */
export type SelectorPatch =
  | { op: "add"; key: string; value: string }
  | { op: "remove"; key: string };

/**
 * An aborted `opts.signal` releases the caller with CancelledError, but the request may
 * already be in flight and can still reach the cluster.
 */
export interface ClusterGateway {
  readonly namespace: string;
  /** Label selector in `k=v[,k=v]` form; omitted lists everything in the namespace. */
  listDeployments(labelSelector?: string, opts?: OperationOptions): Promise<V1Deployment[]>;
  /** Throws NotFoundError when absent. */
  getDeployment(name: string, opts?: OperationOptions): Promise<V1Deployment>;
  createDeployment(deployment: V1Deployment, opts?: OperationOptions): Promise<V1Deployment>;
  getService(name: string, opts?: OperationOptions): Promise<V1Service>;
  /** Must be idempotent: removing an absent key or re-adding the same value is a no-op. */
  patchServiceSelector(name: string, patch: SelectorPatch, opts?: OperationOptions): Promise<V1Service>;
  getEndpoints(name: string, opts?: OperationOptions): Promise<V1Endpoints>;
}

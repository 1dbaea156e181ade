/**
 * Canary service: the three cluster operations over one injected gateway.
 */

import type { ClusterGateway } from "./gateway/types.js";
import type { AppState, OperationOptions, TrafficSettleOptions, Workload } from "./types.js";
import { projectAppState } from "./stateProjector.js";
import { spawnCanary, type SpawnCanaryOptions } from "./canarySpawner.js";
import { setCanaryTraffic, DEFAULT_SETTLE_OPTIONS } from "./trafficSwitch.js";
import { listApplications } from "./applications.js";

export class CanaryService {
  constructor(
    private gateway: ClusterGateway,
    private settle: TrafficSettleOptions = DEFAULT_SETTLE_OPTIONS
  ) {}

  get namespace(): string {
    return this.gateway.namespace;
  }

  listApplications(opts?: OperationOptions): Promise<string[]> {
    return listApplications(this.gateway, opts);
  }

  getAppState(applicationName: string, opts?: OperationOptions): Promise<AppState> {
    return projectAppState(this.gateway, applicationName, opts);
  }

  createCanary(
    applicationName: string,
    imageTag: string,
    replicaCount: number,
    opts?: SpawnCanaryOptions
  ): Promise<Workload> {
    return spawnCanary(this.gateway, applicationName, imageTag, replicaCount, opts);
  }

  setCanaryTraffic(applicationName: string, enabled: boolean, opts?: OperationOptions): Promise<AppState> {
    return setCanaryTraffic(this.gateway, applicationName, enabled, { ...opts, settle: this.settle });
  }
}

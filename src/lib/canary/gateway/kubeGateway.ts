/**
 * Kubernetes-backed cluster gateway.
 * Wraps AppsV1Api/CoreV1Api for one namespace and translates client errors.
 */

import k8s from "@kubernetes/client-node";
import type { AppsV1Api, CoreV1Api, V1Deployment, V1Endpoints, V1Service } from "@kubernetes/client-node";
import type { ClusterGateway, SelectorPatch } from "./types.js";
import type { OperationOptions } from "../types.js";
import { CanarySwitchError, GatewayError, NotFoundError } from "../errors.js";
import { withSignal } from "../abort.js";
import { createLogger } from "../../../utils/logger.js";

export type AppsApi = Pick<
  AppsV1Api,
  "listNamespacedDeployment" | "readNamespacedDeployment" | "createNamespacedDeployment"
>;

export type CoreApi = Pick<
  CoreV1Api,
  "readNamespacedService" | "patchNamespacedService" | "readNamespacedEndpoints"
>;

export interface KubeGatewayConfig {
  namespace: string;
  /** Path to a kubeconfig file; omitted uses the client's default discovery (env, ~/.kube, in-cluster). */
  kubeconfigPath?: string;
  context?: string;
}

const MERGE_PATCH_HEADERS = {
  headers: { "Content-Type": k8s.PatchUtils.PATCH_FORMAT_JSON_MERGE_PATCH },
};

/**
 * RFC 7386 merge patch for the selector. Deleting an absent key and re-setting an equal
 * value are both no-ops, unlike JSON Patch `remove`.
 */
export function toMergePatch(patch: SelectorPatch): { spec: { selector: Record<string, string | null> } } {
  return {
    spec: { selector: { [patch.key]: patch.op === "add" ? patch.value : null } },
  };
}

function upstreamMessage(body: unknown): string | undefined {
  if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
    return body.message;
  }
  if (typeof body === "string" && body !== "") return body;
  return undefined;
}

export function translateError(e: unknown, kind: string, name: string): Error {
  if (e instanceof CanarySwitchError) return e;
  if (e instanceof k8s.HttpError) {
    if (e.statusCode === 404) return new NotFoundError(kind, name, e);
    const detail = upstreamMessage(e.body) ?? e.message;
    return new GatewayError(`${kind} "${name}": ${detail}`, e.statusCode, e);
  }
  const cause = e instanceof Error ? e : undefined;
  return new GatewayError(`${kind} "${name}": ${cause?.message ?? String(e)}`, undefined, cause);
}

export class KubeClusterGateway implements ClusterGateway {
  private logger = createLogger("KubeClusterGateway");

  constructor(
    public readonly namespace: string,
    private apps: AppsApi,
    private core: CoreApi
  ) {}

  static fromConfig(config: KubeGatewayConfig): KubeClusterGateway {
    const kc = new k8s.KubeConfig();
    if (config.kubeconfigPath) {
      kc.loadFromFile(config.kubeconfigPath);
    } else {
      kc.loadFromDefault();
    }
    if (config.context) {
      kc.setCurrentContext(config.context);
    }
    const gateway = new KubeClusterGateway(
      config.namespace,
      kc.makeApiClient(k8s.AppsV1Api),
      kc.makeApiClient(k8s.CoreV1Api)
    );
    gateway.logger.info(`context=${kc.getCurrentContext()} namespace=${config.namespace}`);
    return gateway;
  }

  private async call<T>(kind: string, name: string, start: () => Promise<T>, opts?: OperationOptions): Promise<T> {
    try {
      return await withSignal(start, opts?.signal);
    } catch (e) {
      const err = translateError(e, kind, name);
      this.logger.debug(`${kind} ${name} failed:`, err.message);
      throw err;
    }
  }

  async listDeployments(labelSelector?: string, opts?: OperationOptions): Promise<V1Deployment[]> {
    const res = await this.call(
      "Deployment list",
      labelSelector ?? "*",
      () => this.apps.listNamespacedDeployment(this.namespace, undefined, undefined, undefined, undefined, labelSelector),
      opts
    );
    return res.body.items;
  }

  async getDeployment(name: string, opts?: OperationOptions): Promise<V1Deployment> {
    const res = await this.call(
      "Deployment",
      name,
      () => this.apps.readNamespacedDeployment(name, this.namespace),
      opts
    );
    return res.body;
  }

  async createDeployment(deployment: V1Deployment, opts?: OperationOptions): Promise<V1Deployment> {
    const name = deployment.metadata?.name ?? "";
    const res = await this.call(
      "Deployment",
      name,
      () => this.apps.createNamespacedDeployment(this.namespace, deployment),
      opts
    );
    return res.body;
  }

  async getService(name: string, opts?: OperationOptions): Promise<V1Service> {
    const res = await this.call("Service", name, () => this.core.readNamespacedService(name, this.namespace), opts);
    return res.body;
  }

  async patchServiceSelector(name: string, patch: SelectorPatch, opts?: OperationOptions): Promise<V1Service> {
    const res = await this.call(
      "Service",
      name,
      () =>
        this.core.patchNamespacedService(
          name,
          this.namespace,
          toMergePatch(patch),
          undefined,
          undefined,
          undefined,
          undefined,
          undefined,
          MERGE_PATCH_HEADERS
        ),
      opts
    );
    return res.body;
  }

  async getEndpoints(name: string, opts?: OperationOptions): Promise<V1Endpoints> {
    const res = await this.call(
      "Endpoints",
      name,
      () => this.core.readNamespacedEndpoints(name, this.namespace),
      opts
    );
    return res.body;
  }
}

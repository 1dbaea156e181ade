/**
 * Object builders for canary tests.
 */

import type { V1Deployment, V1Endpoints, V1Service } from "@kubernetes/client-node";

export interface DeploymentFixture {
  name: string;
  app?: string;
  track?: string;
  image?: string;
  replicas?: number;
  available?: number;
  /** Value of the devops-tool-htmx annotation; null omits it. */
  managed?: string | null;
  containers?: boolean;
}

export function makeDeployment(f: DeploymentFixture): V1Deployment {
  const app = f.app ?? "nginx";
  const labels: Record<string, string> = { app };
  if (f.track != null) labels.track = f.track;
  const annotations: Record<string, string> = {};
  const managed = f.managed === undefined ? "true" : f.managed;
  if (managed !== null) annotations["devops-tool-htmx"] = managed;
  return {
    apiVersion: "apps/v1",
    kind: "Deployment",
    metadata: { name: f.name, labels, annotations },
    spec: {
      replicas: f.replicas ?? 1,
      selector: { matchLabels: { ...labels } },
      template: {
        metadata: { labels: { ...labels } },
        spec: {
          containers:
            f.containers === false
              ? []
              : [
                  {
                    name: app,
                    image: f.image ?? "nginx:1.25.0-alpine",
                    ports: [{ containerPort: 80 }],
                    resources: { limits: { cpu: "250m", memory: "128Mi" } },
                    env: [{ name: "MODE", value: "test" }],
                  },
                ],
        },
      },
    },
    status: f.available == null ? undefined : { availableReplicas: f.available },
  };
}

export function makeService(name: string, selector: Record<string, string>): V1Service {
  return {
    apiVersion: "v1",
    kind: "Service",
    metadata: { name, labels: { app: name } },
    spec: { selector: { ...selector }, ports: [{ port: 80, targetPort: 80 }] },
  };
}

export function makeEndpoints(name: string, addresses: Array<{ pod?: string; ip: string }>): V1Endpoints {
  return {
    apiVersion: "v1",
    kind: "Endpoints",
    metadata: { name },
    subsets: [
      {
        addresses: addresses.map((a) => ({
          ip: a.ip,
          ...(a.pod != null && { targetRef: { kind: "Pod", name: a.pod } }),
        })),
      },
    ],
  };
}

/** Primary nginx deployment (3 replicas, pinned to main) with its Service and Endpoints. */
export function nginxPrimary(): V1Deployment {
  return makeDeployment({ name: "nginx", track: "main", replicas: 3, available: 3 });
}

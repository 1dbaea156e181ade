import { describe, it, expect } from "vitest";
import { CanaryService } from "../canaryService.js";
import { InMemoryClusterGateway } from "./inMemoryGateway.js";
import { makeEndpoints, makeService, nginxPrimary } from "./fixtures.js";

function nginxCluster() {
  const gw = new InMemoryClusterGateway({
    deployments: [nginxPrimary()],
    services: [makeService("nginx", { app: "nginx", track: "main" })],
    endpoints: [makeEndpoints("nginx", [])],
  });
  gw.reconcile("nginx");
  return gw;
}

describe("CanaryService end to end", () => {
  it("reads state, spawns a canary and opens traffic to it", async () => {
    const gw = nginxCluster();
    const service = new CanaryService(gw, { pollIntervalMs: 10, settleTimeoutMs: 500 });

    const before = await service.getAppState("nginx");
    expect(before.canaryEnabled).toBe(false);
    expect(before.deployments).toEqual([
      { name: "nginx", image: "nginx:1.25.0-alpine", track: "main", replicas: 3, availableReplicas: 3 },
    ]);

    const created = await service.createCanary("nginx", "canary", 1, { nameToken: () => "gentle-heron" });
    expect(created.name).toBe("nginx-canary-gentle-heron");

    const afterCreate = await service.getAppState("nginx");
    expect(afterCreate.canaryEnabled).toBe(false);
    expect(afterCreate.deployments[1]).toEqual({
      name: "nginx-canary-gentle-heron",
      image: "nginx:canary",
      track: "canary",
      replicas: 1,
      availableReplicas: 0,
    });

    gw.setAvailable("nginx-canary-gentle-heron", 1);
    const enabled = await service.setCanaryTraffic("nginx", true);
    expect(gw.selectorOf("nginx")).toEqual({ app: "nginx" });
    expect(enabled.canaryEnabled).toBe(true);
    expect(enabled.endpoints.map((e) => e.targetInstance)).toEqual([
      "nginx-7c9d8-0",
      "nginx-7c9d8-1",
      "nginx-7c9d8-2",
      "nginx-canary-gentle-heron-7c9d8-0",
    ]);

    const disabled = await service.setCanaryTraffic("nginx", false);
    expect(disabled.canaryEnabled).toBe(false);
    expect(disabled.endpoints.map((e) => e.targetInstance)).toEqual([
      "nginx-7c9d8-0",
      "nginx-7c9d8-1",
      "nginx-7c9d8-2",
    ]);
  });

  it("lists applications and exposes the namespace", async () => {
    const service = new CanaryService(nginxCluster());
    expect(service.namespace).toBe("default");
    expect(await service.listApplications()).toEqual(["nginx"]);
  });
});

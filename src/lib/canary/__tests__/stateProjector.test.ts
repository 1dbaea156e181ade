import { describe, it, expect } from "vitest";
import {
  projectAppState,
  parseBool,
  isManagedWorkload,
  isCanaryEnabled,
  toEndpoints,
  toWorkload,
} from "../stateProjector.js";
import { CancelledError, GatewayError, MalformedWorkloadError, NotFoundError } from "../errors.js";
import { InMemoryClusterGateway } from "./inMemoryGateway.js";
import { makeDeployment, makeEndpoints, makeService, nginxPrimary } from "./fixtures.js";

function nginxGateway(extra: ReturnType<typeof makeDeployment>[] = []) {
  return new InMemoryClusterGateway({
    deployments: [nginxPrimary(), ...extra],
    services: [makeService("nginx", { app: "nginx", track: "main" })],
    endpoints: [
      makeEndpoints("nginx", [
        { pod: "nginx-7c9d8-0", ip: "10.0.0.1" },
        { pod: "nginx-7c9d8-1", ip: "10.0.0.2" },
      ]),
    ],
  });
}

describe("parseBool", () => {
  it("accepts the usual true spellings", () => {
    for (const v of ["1", "t", "T", "TRUE", "true", "True"]) expect(parseBool(v)).toBe(true);
  });

  it("accepts the usual false spellings", () => {
    for (const v of ["0", "f", "F", "FALSE", "false", "False"]) expect(parseBool(v)).toBe(false);
  });

  it("returns null for missing or malformed values", () => {
    expect(parseBool(undefined)).toBeNull();
    expect(parseBool("")).toBeNull();
    expect(parseBool("yes")).toBeNull();
    expect(parseBool("tRuE")).toBeNull();
  });
});

describe("isManagedWorkload", () => {
  it("requires a true marker and a non-empty track", () => {
    expect(isManagedWorkload(makeDeployment({ name: "a", track: "main" }))).toBe(true);
    expect(isManagedWorkload(makeDeployment({ name: "b", track: "main", managed: "false" }))).toBe(false);
    expect(isManagedWorkload(makeDeployment({ name: "c", track: "main", managed: "yes" }))).toBe(false);
    expect(isManagedWorkload(makeDeployment({ name: "d", track: "main", managed: null }))).toBe(false);
    expect(isManagedWorkload(makeDeployment({ name: "e" }))).toBe(false);
    expect(isManagedWorkload(makeDeployment({ name: "f", track: "" }))).toBe(false);
  });
});

describe("isCanaryEnabled", () => {
  it("is false only for track=main", () => {
    expect(isCanaryEnabled(makeService("s", { app: "s", track: "main" }))).toBe(false);
    expect(isCanaryEnabled(makeService("s", { app: "s" }))).toBe(true);
    expect(isCanaryEnabled(makeService("s", { app: "s", track: "canary" }))).toBe(true);
    expect(isCanaryEnabled(makeService("s", { app: "s", track: "Main" }))).toBe(true);
    expect(isCanaryEnabled({ metadata: { name: "bare" } })).toBe(true);
  });
});

describe("toWorkload", () => {
  it("reads image from the first container and defaults missing counts", () => {
    const d = makeDeployment({ name: "nginx", track: "main", image: "nginx:1.25.0-alpine" });
    if (d.spec) delete d.spec.replicas;
    expect(toWorkload(d)).toEqual({
      name: "nginx",
      image: "nginx:1.25.0-alpine",
      track: "main",
      replicas: 1,
      availableReplicas: 0,
    });
  });

  it("throws MalformedWorkloadError when no containers are declared", () => {
    const d = makeDeployment({ name: "empty", track: "main", containers: false });
    expect(() => toWorkload(d)).toThrow(MalformedWorkloadError);
  });
});

describe("toEndpoints", () => {
  it("maps the first subset only", () => {
    const e = makeEndpoints("nginx", [{ pod: "nginx-7c9d8-0", ip: "10.0.0.1" }, { ip: "10.0.0.9" }]);
    e.subsets?.push({ addresses: [{ ip: "10.9.9.9", targetRef: { name: "other" } }] });
    expect(toEndpoints(e)).toEqual([
      { targetInstance: "nginx-7c9d8-0", address: "10.0.0.1" },
      { targetInstance: "", address: "10.0.0.9" },
    ]);
  });

  it("is empty without subsets", () => {
    expect(toEndpoints({ metadata: { name: "nginx" } })).toEqual([]);
  });
});

describe("projectAppState", () => {
  it("projects the primary, the selector and the endpoints", async () => {
    const state = await projectAppState(nginxGateway(), "nginx");
    expect(state).toEqual({
      canaryEnabled: false,
      deployments: [
        { name: "nginx", image: "nginx:1.25.0-alpine", track: "main", replicas: 3, availableReplicas: 3 },
      ],
      endpoints: [
        { targetInstance: "nginx-7c9d8-0", address: "10.0.0.1" },
        { targetInstance: "nginx-7c9d8-1", address: "10.0.0.2" },
      ],
    });
  });

  it("never surfaces unmanaged or trackless workloads, however many exist", async () => {
    const noise = Array.from({ length: 20 }, (_, i) =>
      i % 2 === 0
        ? makeDeployment({ name: `unmanaged-${i}`, track: "main", managed: i % 4 === 0 ? null : "nope" })
        : makeDeployment({ name: `trackless-${i}` })
    );
    const state = await projectAppState(nginxGateway(noise), "nginx");
    expect(state.deployments.map((d) => d.name)).toEqual(["nginx"]);
  });

  it("ignores deployments of other applications", async () => {
    const other = makeDeployment({ name: "redis", app: "redis", track: "main" });
    const state = await projectAppState(nginxGateway([other]), "nginx");
    expect(state.deployments.map((d) => d.name)).toEqual(["nginx"]);
  });

  it("keeps the gateway's order", async () => {
    const canary = makeDeployment({ name: "nginx-canary-a", track: "canary", available: 1 });
    const beta = makeDeployment({ name: "nginx-beta", track: "beta" });
    const state = await projectAppState(nginxGateway([canary, beta]), "nginx");
    expect(state.deployments.map((d) => d.name)).toEqual(["nginx", "nginx-canary-a", "nginx-beta"]);
  });

  it("fails with NotFoundError when the service is missing", async () => {
    const gw = new InMemoryClusterGateway({
      deployments: [nginxPrimary()],
      endpoints: [makeEndpoints("nginx", [])],
    });
    await expect(projectAppState(gw, "nginx")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("fails with NotFoundError when the endpoints are missing", async () => {
    const gw = new InMemoryClusterGateway({
      deployments: [nginxPrimary()],
      services: [makeService("nginx", { app: "nginx" })],
    });
    await expect(projectAppState(gw, "nginx")).rejects.toThrow('Endpoints "nginx" not found');
  });

  it("returns no partial state when the endpoint fetch fails after the list succeeds", async () => {
    const gw = nginxGateway();
    gw.failOn("getEndpoints", new GatewayError("connection reset", 503));
    let state: unknown = "unset";
    try {
      state = await projectAppState(gw, "nginx");
    } catch (e) {
      expect(e).toBeInstanceOf(GatewayError);
    }
    expect(state).toBe("unset");
    expect(gw.calls).toEqual(["listDeployments", "getEndpoints"]);
  });

  it("fails with MalformedWorkloadError for a managed deployment without containers", async () => {
    const broken = makeDeployment({ name: "nginx-broken", track: "canary", containers: false });
    await expect(projectAppState(nginxGateway([broken]), "nginx")).rejects.toBeInstanceOf(
      MalformedWorkloadError
    );
  });

  it("rejects with CancelledError when already aborted and makes no calls", async () => {
    const gw = nginxGateway();
    const controller = new AbortController();
    controller.abort();
    await expect(projectAppState(gw, "nginx", { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(gw.calls).toEqual([]);
  });

  it("abandons an outstanding gateway call when aborted", async () => {
    const gw = nginxGateway();
    gw.hangOn("getService");
    const controller = new AbortController();
    const pending = projectAppState(gw, "nginx", { signal: controller.signal });
    setTimeout(() => controller.abort(), 5);
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});

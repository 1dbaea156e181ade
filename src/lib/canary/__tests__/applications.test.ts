import { describe, it, expect } from "vitest";
import { listApplications } from "../applications.js";
import { InMemoryClusterGateway } from "./inMemoryGateway.js";
import { makeDeployment } from "./fixtures.js";

describe("listApplications", () => {
  it("returns distinct app labels, sorted, managed or not", async () => {
    const unlabelled = makeDeployment({ name: "orphan" });
    if (unlabelled.metadata) unlabelled.metadata.labels = {};
    const gw = new InMemoryClusterGateway({
      deployments: [
        makeDeployment({ name: "web", app: "web", track: "main" }),
        makeDeployment({ name: "nginx", track: "main" }),
        makeDeployment({ name: "nginx-canary-a", track: "canary" }),
        makeDeployment({ name: "api", app: "api", managed: null }),
        unlabelled,
      ],
    });
    expect(await listApplications(gw)).toEqual(["api", "nginx", "web"]);
  });

  it("is empty for an empty namespace", async () => {
    expect(await listApplications(new InMemoryClusterGateway())).toEqual([]);
  });
});

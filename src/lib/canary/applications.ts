/**
 * Application discovery for the index page.
 */

import type { ClusterGateway } from "./gateway/types.js";
import { APP_LABEL, type OperationOptions } from "./types.js";
import { withSignal } from "./abort.js";

/** Distinct non-empty `app` label values across every Deployment in the namespace, sorted. */
export async function listApplications(
  gateway: ClusterGateway,
  opts: OperationOptions = {}
): Promise<string[]> {
  const { signal } = opts;
  const deployments = await withSignal(() => gateway.listDeployments(undefined, { signal }), signal);
  const apps = new Set<string>();
  for (const d of deployments) {
    const app = d.metadata?.labels?.[APP_LABEL];
    if (app) apps.add(app);
  }
  return [...apps].sort();
}

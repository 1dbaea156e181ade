/**
 * Express server - canary switch over the configured cluster namespace.
 */

import {
  CanaryService,
  KubeClusterGateway,
  getKubeContext,
  getKubeconfigPath,
  getNamespace,
  getPort,
  getTrafficSettleOptions,
} from "../src/lib/canary/index.js";
import { createLogger } from "../src/utils/logger.js";
import { createApp } from "./app.js";

const log = createLogger("Server");

async function start() {
  const gateway = KubeClusterGateway.fromConfig({
    namespace: getNamespace(),
    kubeconfigPath: getKubeconfigPath(),
    context: getKubeContext(),
  });
  const service = new CanaryService(gateway, getTrafficSettleOptions());
  const app = createApp(service);
  const port = getPort();

  app.listen(port, "0.0.0.0", () => {
    log.info(`running at http://0.0.0.0:${port} (namespace ${gateway.namespace})`);
  });
}

start().catch((e) => {
  log.error("failed to start:", e);
  process.exit(1);
});

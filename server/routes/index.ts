/**
 * Route registration for Express.
 */

import type { Express } from "express";
import type { CanaryService } from "../../src/lib/canary/index.js";
import { makeAppHandlers } from "./apps.js";

export function registerRoutes(app: Express, service: CanaryService): void {
  const h = makeAppHandlers(service);

  app.get("/", h.indexGet);
  app.get("/healthz", h.healthGet);

  app.get("/app", h.appLookupGet);
  app.get("/app/:name", h.appStateGet);
  app.post("/app/:name/create_canary", h.createCanaryPost);
  app.get("/app/:name/set_canary", h.setCanaryGet);
}

/**
 * Express app factory. The canary service is injected so tests can run it over a fake gateway.
 */

import express, { type Express } from "express";
import cors from "cors";
import type { CanaryService } from "../src/lib/canary/index.js";
import { registerRoutes } from "./routes/index.js";
import { requestLog } from "./middleware/requestLog.js";

export function createApp(service: CanaryService): Express {
  const app = express();

  app.use(requestLog());
  app.use(cors());
  app.use(express.json());
  // HTMX forms post urlencoded bodies.
  app.use(express.urlencoded({ extended: false }));

  registerRoutes(app, service);
  return app;
}

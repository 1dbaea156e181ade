/**
 * Application routes - state, canary creation, traffic toggle.
 */

import type { Request, Response } from "express";
import { z } from "zod";
import type { CanaryService } from "../../src/lib/canary/index.js";
import { renderIndex } from "../views/render.js";
import { err, isHtmxRequest, paramName, requestSignal, sendAppState, sendError } from "./respond.js";

const CreateCanaryBodySchema = z.object({
  tag: z.string(),
  // Deployment replicas: non-negative int32.
  replicas: z.coerce.number().int().min(0).max(2_147_483_647),
});

const SetCanaryQuerySchema = z.object({
  enabled: z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((v) => v === "true" || v === "1"),
});

export interface AppHandlers {
  indexGet(req: Request, res: Response): Promise<void>;
  appLookupGet(req: Request, res: Response): Promise<void>;
  appStateGet(req: Request, res: Response): Promise<void>;
  createCanaryPost(req: Request, res: Response): Promise<void>;
  setCanaryGet(req: Request, res: Response): Promise<void>;
  healthGet(req: Request, res: Response): void;
}

export function makeAppHandlers(service: CanaryService): AppHandlers {
  return {
    async indexGet(_req, res) {
      try {
        const apps = await service.listApplications({ signal: requestSignal(res) });
        res.type("html").send(renderIndex(apps, service.namespace));
      } catch (e) {
        sendError(res, e);
      }
    },

    async appLookupGet(req, res) {
      const name = typeof req.query.name === "string" ? req.query.name.trim() : "";
      if (!name) {
        return err(res, 400, "VALIDATION_ERROR", "Missing required query parameter: name");
      }
      if (!isHtmxRequest(req)) {
        return res.redirect(`/app/${encodeURIComponent(name)}`);
      }
      // The index form swaps the partial in place.
      try {
        const state = await service.getAppState(name, { signal: requestSignal(res) });
        sendAppState(req, res, name, state);
      } catch (e) {
        sendError(res, e);
      }
    },

    async appStateGet(req, res) {
      try {
        const name = paramName(req, "name");
        const state = await service.getAppState(name, { signal: requestSignal(res) });
        sendAppState(req, res, name, state);
      } catch (e) {
        sendError(res, e);
      }
    },

    async createCanaryPost(req, res) {
      try {
        const name = paramName(req, "name");
        const body = CreateCanaryBodySchema.safeParse(req.body ?? {});
        if (!body.success) {
          return err(res, 400, "VALIDATION_ERROR", "Body requires tag and replicas between 0 and 2147483647", body.error.issues);
        }
        const signal = requestSignal(res);
        await service.createCanary(name, body.data.tag, body.data.replicas, { signal });
        const state = await service.getAppState(name, { signal });
        sendAppState(req, res, name, state);
      } catch (e) {
        sendError(res, e);
      }
    },

    async setCanaryGet(req, res) {
      try {
        const name = paramName(req, "name");
        const query = SetCanaryQuerySchema.safeParse(req.query);
        if (!query.success) {
          return err(res, 400, "VALIDATION_ERROR", "enabled must be true or false", query.error.issues);
        }
        const state = await service.setCanaryTraffic(name, query.data.enabled, { signal: requestSignal(res) });
        sendAppState(req, res, name, state);
      } catch (e) {
        sendError(res, e);
      }
    },

    healthGet(_req, res) {
      res.json({ status: "ok", namespace: service.namespace });
    },
  };
}

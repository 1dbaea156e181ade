/**
 * Shared response helpers: error envelope, HTMX detection, request cancellation.
 */

import type { Request, Response } from "express";
import {
  CanarySwitchError,
  GatewayError,
  parseBool,
  type AppState,
  type CanaryErrorCode,
} from "../../src/lib/canary/index.js";
import { renderApp } from "../views/render.js";

const STATUS_BY_CODE: Record<CanaryErrorCode, number> = {
  NOT_FOUND: 404,
  MALFORMED_WORKLOAD: 422,
  INVALID_TAG: 400,
  GATEWAY_ERROR: 502,
  CANCELLED: 499,
};

export function statusForError(e: unknown): number {
  if (e instanceof GatewayError && e.statusCode === 409) return 409;
  if (e instanceof CanarySwitchError) return STATUS_BY_CODE[e.code];
  return 500;
}

export function err(res: Response, status: number, code: string, message: string, details?: unknown) {
  res.locals.errorMessage = message;
  res.status(status).json({ success: false, error: { code, message, details } });
}

export function sendError(res: Response, e: unknown) {
  // Client already went away; nothing left to answer.
  if (res.headersSent || res.destroyed) return;
  const status = statusForError(e);
  const code = e instanceof CanarySwitchError ? e.code : "INTERNAL_ERROR";
  const message = e instanceof Error ? e.message : "Internal server error";
  err(res, status, code, message);
}

export function isHtmxRequest(req: Request): boolean {
  return parseBool(req.get("HX-Request")) === true;
}

/** Sends the HTMX partial for HTMX requests and the AppState JSON otherwise. */
export function sendAppState(req: Request, res: Response, name: string, state: AppState) {
  if (isHtmxRequest(req)) {
    res.type("html").send(renderApp(name, state));
    return;
  }
  res.json(state);
}

/** Aborted when the client disconnects before the response is written. */
export function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

export function paramName(req: Request, name: string): string {
  const v = req.params[name];
  return Array.isArray(v) ? v[0] ?? "" : (v ?? "");
}

/**
 * Access log: `[ip]:port status - METHOD path - error`, one line per finished response.
 */

import type { NextFunction, Request, Response } from "express";
import { createLogger, type Logger } from "../../src/utils/logger.js";

export function formatAccessLine(
  ip: string,
  port: number | undefined,
  status: number,
  method: string,
  path: string,
  error?: string
): string {
  return `[${ip}]:${port ?? "-"} ${status} - ${method} ${path} - ${error ?? ""}`;
}

export function requestLog(logger: Logger = createLogger("HTTP")) {
  return (req: Request, res: Response, next: NextFunction) => {
    res.on("finish", () => {
      const error = typeof res.locals.errorMessage === "string" ? res.locals.errorMessage : undefined;
      logger.info(
        formatAccessLine(req.ip ?? "-", req.socket.remotePort, res.statusCode, req.method, req.path, error)
      );
    });
    next();
  };
}

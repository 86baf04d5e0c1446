/**
 * CORS Middleware
 *
 * The API is read-only and public, so every origin may read it.
 * Preflight requests are answered here and never reach a router.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";

export function permissiveCors(allowOrigin: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    res.header("Access-Control-Allow-Origin", allowOrigin);
    res.header("Access-Control-Allow-Methods", "GET, OPTIONS");
    res.header("Access-Control-Allow-Headers", "*");

    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }

    next();
  };
}

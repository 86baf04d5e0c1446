/**
 * Error Handling Middleware
 *
 * Error bodies share one shape: { error: CODE, message }.
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import type { Logger } from "pino";
import { CatalogUnavailableError } from "../services/catalog/catalogLoader";

export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class InvalidQueryError extends HttpError {
  constructor(message: string) {
    super(400, "INVALID_QUERY", message);
    this.name = "InvalidQueryError";
  }
}

/** Catalog failures name the file and the variable that overrides it. */
function toHttpError(error: unknown): HttpError {
  if (error instanceof HttpError) return error;
  if (error instanceof CatalogUnavailableError) {
    return new HttpError(503, "DATA_UNAVAILABLE", `${error.message} Set PRODUCTS_JSON_PATH.`);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new HttpError(500, "INTERNAL_ERROR", message);
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: "NOT_FOUND", message: "Not found" });
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  const log = logger.child({ module: "errors" });

  return (error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const httpError = toHttpError(error);
    if (httpError.statusCode >= 500) {
      log.error({ err: error, method: req.method, path: req.path }, "Request failed");
    } else {
      log.warn({ method: req.method, path: req.path, code: httpError.code }, httpError.message);
    }

    res.status(httpError.statusCode).json({ error: httpError.code, message: httpError.message });
  };
}

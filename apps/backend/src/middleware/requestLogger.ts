import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { Logger } from "pino";

/** Log one line per completed request. */
export function requestLogger(logger: Logger): RequestHandler {
  const log = logger.child({ module: "http" });

  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on("finish", () => {
      log.info(
        {
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          durationMs: Date.now() - startTime,
        },
        "Request completed",
      );
    });

    next();
  };
}

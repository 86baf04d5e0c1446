/**
 * AppContext: composition root for the backend.
 *
 * Wires the logger and the catalog service from runtime configuration so that
 * server.ts stays a thin HTTP shell and tests can build a context by hand.
 */

import pino, { type Logger } from "pino";
import { runtimeConfig, type RuntimeConfig } from "../config";
import { CatalogService } from "../services/catalog/catalogService";

export interface AppContext {
  logger: Logger;
  catalog: CatalogService;
  corsAllowOrigin: string;
}

export function createLogger(level: RuntimeConfig["logLevel"] = runtimeConfig.logLevel): Logger {
  const destination = pino.destination({ sync: process.env.NODE_ENV !== "production" });
  destination.on("error", (err: NodeJS.ErrnoException) => {
    if (err?.code === "EINTR") return;
    console.error("pino destination error", err);
  });
  return pino({ level }, destination);
}

export function createContext(config: RuntimeConfig = runtimeConfig): AppContext {
  const logger = createLogger(config.logLevel);

  logger.info(
    { productsPath: config.dataPaths.productsPath, snapshotsPath: config.dataPaths.snapshotsPath },
    "Serving catalog from scraper output",
  );

  return {
    logger,
    catalog: new CatalogService(config.dataPaths, logger),
    corsAllowOrigin: config.corsAllowOrigin,
  };
}

/**
 * Pricebook Backend Server (Entry Point)
 *
 * Thin shell: context creation, listen, graceful shutdown.
 * Route registration lives in ./app/http.ts; feature routers in ./routes/*.
 */

import { createContext } from "./app/context";
import { createApp } from "./app/http";
import { runtimeConfig } from "./config";

const ctx = createContext(runtimeConfig);
const { logger } = ctx;
const app = createApp(ctx);

const { port, host } = runtimeConfig;
const server = app.listen(port, host, () => {
  logger.info({ port, host }, "Pricebook backend listening");
});

server.on("error", (error) => {
  logger.fatal({ err: error }, "Fatal error during server startup");
  process.exit(1);
});

let shuttingDown = false;

const shutdown = (signal: NodeJS.Signals) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Received termination signal, initiating graceful shutdown");

  server.close(() => {
    logger.info("HTTP server closed, graceful shutdown complete");
    process.exit(0);
  });

  // Force exit after timeout (configurable via GRACEFUL_SHUTDOWN_MS)
  setTimeout(() => {
    logger.warn(
      { timeoutMs: runtimeConfig.gracefulShutdownMs },
      "Graceful shutdown timeout exceeded, forcing exit",
    );
    process.exit(1);
  }, runtimeConfig.gracefulShutdownMs).unref();
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

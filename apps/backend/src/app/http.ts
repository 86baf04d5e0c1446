/**
 * HTTP Application Factory
 *
 * Creates the Express app with core middleware and registers feature routers.
 */

import express, { type Express } from "express";
import type { AppContext } from "./context";
import { permissiveCors } from "../middleware/cors";
import { requestLogger } from "../middleware/requestLogger";
import { errorHandler, notFoundHandler } from "../middleware/errorHandler";

// Route registrars
import { registerHealthRoutes } from "../routes/health";
import { registerProductRoutes } from "../routes/products";

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.disable("x-powered-by");

  app.use(requestLogger(ctx.logger));
  app.use(permissiveCors(ctx.corsAllowOrigin));

  registerHealthRoutes(app);
  registerProductRoutes(app, ctx);

  app.use(notFoundHandler);
  app.use(errorHandler(ctx.logger));

  return app;
}

/**
 * HTTP application: request tracing, global error boundary and routes.
 */
import { Hono } from "hono";
import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { type ApiServices, createRoutes } from "./routes.js";

export function createApp(services: ApiServices): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);
  app.route("/", createRoutes(services));

  return app;
}

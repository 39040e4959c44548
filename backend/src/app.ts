// Wires middleware and route modules into the Express app; request flow is client -> CORS -> /api/* route handlers.
import express from "express";
import { createCorsMiddleware } from "./cors-policy.js";
import { createHttpRequestLoggingMiddleware } from "./logging/http-logging.middleware.js";
import helloRoute from "./routes/hello.route.js";
import { apiErrorHandler, notFoundHandler } from "./routes/http.js";

export function createApp() {
  const app = express();

  // Must be set before the first app.use so the mount paths honor them too.
  app.set("case sensitive routing", true);
  app.set("strict routing", true);

  app.use(createCorsMiddleware());
  app.use(createHttpRequestLoggingMiddleware());

  app.use("/api", helloRoute);

  app.use(notFoundHandler);
  app.use(apiErrorHandler);

  return app;
}

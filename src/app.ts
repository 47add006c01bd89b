import express from "express";
import { errorHandler, notFoundHandler } from "./middleware/error-handler";
import type { RouteContext } from "./routes/context";
import { healthRoutes } from "./routes/health";
import { postRoutes } from "./routes/posts";
import { tagRoutes } from "./routes/tags";

export function createApp(ctx: RouteContext) {
  const app = express();

  app.disable("x-powered-by");

  app.use(healthRoutes());
  app.use(postRoutes(ctx));
  app.use(tagRoutes(ctx));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

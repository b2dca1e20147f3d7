/**
 * @fileoverview Builds the Hono application: middleware, the health and
 * service info routes, the three POST endpoints, and the 404/500 boundaries.
 * The app holds no per-request state; everything it needs is passed in.
 * @module src/api-server/server
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import type { AppConfig } from "../config/index.js";
import type { NcbiService } from "../services/NCBI/core/ncbiService.js";
import { logger, requestContextService } from "../utils/index.js";
import { failureEnvelope } from "./core/envelope.js";
import type { RouteDependencies } from "./core/routeHandler.js";
import { registerHealthRoutes } from "./routes/health/index.js";
import { registerPublicationDetailsRoute } from "./routes/publicationDetails/index.js";
import { registerSearchPublicationsRoute } from "./routes/searchPublications/index.js";
import { registerSimilarArticlesRoute } from "./routes/similarArticles/index.js";
import { httpErrorHandler } from "./transports/httpErrorHandler.js";

export interface ApiAppOptions {
  config: AppConfig;
  ncbiService: NcbiService;
}

export function createApiApp(options: ApiAppOptions): Hono {
  const { config, ncbiService } = options;
  const context = requestContextService.createRequestContext({
    operation: "createApiApp",
  });

  const app = new Hono();
  const allowedOrigins = config.http.allowedOrigins;

  app.use(
    "*",
    cors({
      origin: allowedOrigins.includes("*") ? "*" : [...allowedOrigins],
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type"],
    }),
  );

  app.use("*", async (c, next) => {
    await next();
    c.header("X-Content-Type-Options", "nosniff");
  });

  const deps: RouteDependencies = {
    ncbiService,
    upstreamTimeoutMs: config.ncbi.timeoutMs,
    tracer: {
      serviceName: config.openTelemetry.serviceName,
      serviceVersion: config.openTelemetry.serviceVersion,
    },
  };

  registerHealthRoutes(
    app,
    {
      name: config.serviceName,
      version: config.serviceVersion,
      description: config.serviceDescription,
    },
    context,
  );
  registerPublicationDetailsRoute(app, deps, context);
  registerSearchPublicationsRoute(app, deps, context);
  registerSimilarArticlesRoute(app, deps, context);

  app.notFound((c) =>
    c.json(
      failureEnvelope(`Route not found: ${c.req.method} ${c.req.path}`),
      404,
    ),
  );
  app.onError(httpErrorHandler);

  logger.info("API application created.", context);
  return app;
}

/**
 * @fileoverview Registration for `POST /similar`.
 * @module src/api-server/routes/similarArticles/registration
 */

import type { Hono } from "hono";
import { logger, type RequestContext } from "../../../utils/index.js";
import {
  createEnvelopeHandler,
  type RouteDependencies,
} from "../../core/routeHandler.js";
import { similarArticlesLogic } from "./logic.js";

export const SIMILAR_ROUTE_PATH = "/similar";

export function registerSimilarArticlesRoute(
  app: Hono,
  deps: RouteDependencies,
  context: RequestContext,
): void {
  app.post(
    SIMILAR_ROUTE_PATH,
    createEnvelopeHandler(
      {
        operation: "similar",
        routeName: "similar_articles",
        failurePrefix: "Failed to get similar articles",
        logic: similarArticlesLogic,
      },
      deps,
    ),
  );
  logger.debug(`Route 'POST ${SIMILAR_ROUTE_PATH}' registered.`, context);
}

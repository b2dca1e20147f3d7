/**
 * @fileoverview Registration for `POST /search`.
 * @module src/api-server/routes/searchPublications/registration
 */

import type { Hono } from "hono";
import { logger, type RequestContext } from "../../../utils/index.js";
import {
  createEnvelopeHandler,
  type RouteDependencies,
} from "../../core/routeHandler.js";
import { searchPublicationsLogic } from "./logic.js";

export const SEARCH_ROUTE_PATH = "/search";

export function registerSearchPublicationsRoute(
  app: Hono,
  deps: RouteDependencies,
  context: RequestContext,
): void {
  app.post(
    SEARCH_ROUTE_PATH,
    createEnvelopeHandler(
      {
        operation: "search",
        routeName: "search_publications",
        failurePrefix: "Search failed",
        logic: searchPublicationsLogic,
      },
      deps,
    ),
  );
  logger.debug(`Route 'POST ${SEARCH_ROUTE_PATH}' registered.`, context);
}

/**
 * @fileoverview Registration for `POST /publication`.
 * @module src/api-server/routes/publicationDetails/registration
 */

import type { Hono } from "hono";
import { logger, type RequestContext } from "../../../utils/index.js";
import {
  createEnvelopeHandler,
  type RouteDependencies,
} from "../../core/routeHandler.js";
import { publicationDetailsLogic } from "./logic.js";

export const PUBLICATION_ROUTE_PATH = "/publication";

export function registerPublicationDetailsRoute(
  app: Hono,
  deps: RouteDependencies,
  context: RequestContext,
): void {
  app.post(
    PUBLICATION_ROUTE_PATH,
    createEnvelopeHandler(
      {
        operation: "publication",
        routeName: "publication_details",
        failurePrefix: "Failed to get publication details",
        logic: publicationDetailsLogic,
      },
      deps,
    ),
  );
  logger.debug(`Route 'POST ${PUBLICATION_ROUTE_PATH}' registered.`, context);
}

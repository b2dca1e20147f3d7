/**
 * @fileoverview Barrel file for the publication details route.
 * @module src/api-server/routes/publicationDetails/index
 */

export {
  PUBLICATION_ROUTE_PATH,
  registerPublicationDetailsRoute,
} from "./registration.js";

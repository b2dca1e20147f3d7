/**
 * @fileoverview Barrel file for the search route.
 * @module src/api-server/routes/searchPublications/index
 */

export {
  registerSearchPublicationsRoute,
  SEARCH_ROUTE_PATH,
} from "./registration.js";

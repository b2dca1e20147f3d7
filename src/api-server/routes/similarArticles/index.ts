/**
 * @fileoverview Barrel file for the similar articles route.
 * @module src/api-server/routes/similarArticles/index
 */

export {
  registerSimilarArticlesRoute,
  SIMILAR_ROUTE_PATH,
} from "./registration.js";

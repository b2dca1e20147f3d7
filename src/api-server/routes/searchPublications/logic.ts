/**
 * @fileoverview Logic for `POST /search`.
 * Runs ESearch for the query, fetches the matching records with EFetch and
 * renders them as a numbered markdown list.
 * @module src/api-server/routes/searchPublications/logic
 */

import { AppError, BaseErrorCode } from "../../../types-global/errors.js";
import { logger } from "../../../utils/index.js";
import type { RouteLogicScope } from "../../core/routeHandler.js";
import { formatSearchResults } from "../../formatting/markdownFormatter.js";
import type { SearchRequest } from "../../validation/requestSchemas.js";

export async function searchPublicationsLogic(
  input: SearchRequest,
  scope: RouteLogicScope,
): Promise<string> {
  const { context, signal, ncbiService } = scope;

  const searchResult = await ncbiService.eSearch(
    { term: input.query, retmax: input.max_results, sort: "relevance" },
    { context, signal },
  );
  const pmids = searchResult.idList.slice(0, input.max_results);

  logger.debug("ESearch completed.", {
    ...context,
    totalFound: searchResult.count,
    retrieved: pmids.length,
    queryTranslation: searchResult.queryTranslation,
  });

  if (pmids.length === 0) {
    throw new AppError(
      BaseErrorCode.NO_RESULTS,
      `No publications found for query: '${input.query}'.`,
    );
  }

  const articles = await ncbiService.eFetch(
    { ids: pmids, rettype: "abstract" },
    { context, signal },
  );
  if (articles.length === 0) {
    throw new AppError(
      BaseErrorCode.NO_RESULTS,
      `No publications found for query: '${input.query}'.`,
      { pmids },
    );
  }

  return formatSearchResults({
    query: input.query,
    totalCount: searchResult.count,
    articles,
  });
}

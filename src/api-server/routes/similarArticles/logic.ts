/**
 * @fileoverview Logic for `POST /similar`.
 * Looks up related records with ELink (`pubmed_pubmed`), drops the source PMID,
 * keeps the first `max_results` ids and renders their records like a search.
 * @module src/api-server/routes/similarArticles/logic
 */

import { AppError, BaseErrorCode } from "../../../types-global/errors.js";
import { logger } from "../../../utils/index.js";
import type { RouteLogicScope } from "../../core/routeHandler.js";
import { formatSimilarArticles } from "../../formatting/markdownFormatter.js";
import type { SimilarRequest } from "../../validation/requestSchemas.js";

export async function similarArticlesLogic(
  input: SimilarRequest,
  scope: RouteLogicScope,
): Promise<string> {
  const { context, signal, ncbiService } = scope;
  const noneFound = () =>
    new AppError(
      BaseErrorCode.NO_RESULTS,
      `No similar articles found for PMID: ${input.pmid}.`,
    );

  const linkedIds = await ncbiService.eLink({ id: input.pmid }, { context, signal });
  const pmids = linkedIds.slice(0, input.max_results);
  logger.debug("ELink completed.", {
    ...context,
    linked: linkedIds.length,
    kept: pmids.length,
  });
  if (pmids.length === 0) throw noneFound();

  const articles = await ncbiService.eFetch(
    { ids: pmids, rettype: "abstract" },
    { context, signal },
  );
  if (articles.length === 0) throw noneFound();

  return formatSimilarArticles({ sourcePmid: input.pmid, articles });
}

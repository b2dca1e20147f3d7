/**
 * @fileoverview Logic for `POST /publication`: fetches one record by PMID and
 * renders it as a detailed markdown block.
 * @module src/api-server/routes/publicationDetails/logic
 */

import { AppError, BaseErrorCode } from "../../../types-global/errors.js";
import type { RouteLogicScope } from "../../core/routeHandler.js";
import { formatPublicationDetails } from "../../formatting/markdownFormatter.js";
import type { PublicationRequest } from "../../validation/requestSchemas.js";

export async function publicationDetailsLogic(
  input: PublicationRequest,
  scope: RouteLogicScope,
): Promise<string> {
  const [article] = await scope.ncbiService.eFetch(
    { ids: [input.pmid], rettype: "abstract" },
    { context: scope.context, signal: scope.signal },
  );

  if (!article) {
    throw new AppError(
      BaseErrorCode.NO_RESULTS,
      `No publication found for PMID: ${input.pmid}.`,
    );
  }
  return formatPublicationDetails(article);
}

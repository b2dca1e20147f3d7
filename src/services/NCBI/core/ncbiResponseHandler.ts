/**
 * @fileoverview Handles parsing of NCBI E-utility responses and NCBI-specific error extraction.
 * @module src/services/NCBI/core/ncbiResponseHandler
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { AppError, BaseErrorCode } from "../../../types-global/errors.js";
import type { NcbiXmlDocument } from "../../../types-global/pubmedXml.js";
import {
  logger,
  type RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import {
  ensureArray,
  getText,
  isXmlObject,
} from "../parsing/xmlGenericHelpers.js";
import type { NcbiEndpoint } from "./ncbiConstants.js";

const MAX_ERROR_MESSAGE_LENGTH = 200;

// Full jpaths of elements that repeat; everything else is normalized with ensureArray.
const ARRAY_JPATHS = new Set([
  "eSearchResult.IdList.Id",
  "PubmedArticleSet.PubmedArticle",
  "eLinkResult.LinkSet",
  "eLinkResult.LinkSet.LinkSetDb",
  "eLinkResult.LinkSet.LinkSetDb.Link",
]);

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export class NcbiResponseHandler {
  private readonly xmlParser: XMLParser;

  constructor() {
    this.xmlParser = new XMLParser({
      ignoreAttributes: false,
      attributeNamePrefix: "@_",
      ignoreDeclaration: true,
      // PMIDs and counts stay strings; leading zeros and large ids survive.
      parseTagValue: false,
      parseAttributeValue: false,
      isArray: (_name, jpath) => ARRAY_JPATHS.has(jpath),
    });
  }

  /**
   * Collects the messages of every `ERROR` element NCBI may place in a response.
   */
  private extractNcbiErrorMessages(document: NcbiXmlDocument): string[] {
    const candidates: unknown[] = [document.ERROR];
    if (isXmlObject(document.eSearchResult)) {
      candidates.push(document.eSearchResult.ERROR);
    }
    if (isXmlObject(document.eFetchResult)) {
      candidates.push(document.eFetchResult.ERROR);
    }
    if (isXmlObject(document.eLinkResult)) {
      candidates.push(document.eLinkResult.ERROR);
      for (const linkSet of ensureArray(document.eLinkResult.LinkSet)) {
        if (isXmlObject(linkSet)) candidates.push(linkSet.ERROR);
      }
    }
    return candidates
      .flatMap((candidate) => ensureArray(candidate))
      .map((item) => getText(item).trim())
      .filter(Boolean);
  }

  /**
   * Validates and parses an XML response body, then checks it for NCBI-reported
   * errors.
   * @throws {AppError} `NCBI_PARSING_ERROR` for malformed XML and
   *   `NCBI_API_ERROR` when NCBI reports an error in the body.
   */
  public parseXmlResponse(
    responseData: unknown,
    endpoint: NcbiEndpoint,
    context: RequestContext,
  ): NcbiXmlDocument {
    const operationContext = requestContextService.createRequestContext({
      ...context,
      operation: "NCBI_ParseResponse",
      endpoint,
    });

    if (
      typeof responseData !== "string" ||
      responseData.trim() === "" ||
      XMLValidator.validate(responseData) !== true
    ) {
      const snippet = String(responseData).substring(0, 500);
      logger.error(
        "Invalid or non-string XML response from NCBI",
        new Error("Invalid XML structure"),
        { ...operationContext, responseSnippet: snippet },
      );
      throw new AppError(
        BaseErrorCode.NCBI_PARSING_ERROR,
        "PubMed returned a response that could not be parsed.",
        { endpoint },
      );
    }

    const parsedXml: NcbiXmlDocument = this.xmlParser.parse(responseData);
    if (!isXmlObject(parsedXml)) {
      throw new AppError(
        BaseErrorCode.NCBI_PARSING_ERROR,
        "PubMed returned a response that could not be parsed.",
        { endpoint },
      );
    }

    const errorMessages = this.extractNcbiErrorMessages(parsedXml);
    if (errorMessages.length > 0) {
      const joined = errorMessages.join("; ");
      logger.error(
        "NCBI API returned an error in XML response",
        new Error(joined),
        { ...operationContext, errors: errorMessages },
      );
      throw new AppError(
        BaseErrorCode.NCBI_API_ERROR,
        `PubMed reported an error: ${truncate(joined, MAX_ERROR_MESSAGE_LENGTH)}`,
        { endpoint, ncbiErrors: errorMessages },
      );
    }

    logger.debug("Successfully parsed XML response.", operationContext);
    return parsedXml;
  }
}

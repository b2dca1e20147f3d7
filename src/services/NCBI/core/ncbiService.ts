/**
 * @fileoverview Service for interacting with NCBI E-utilities.
 * Centralizes the ESearch, EFetch and ELink calls the API routes need: builds
 * the request, hands it to {@link NcbiCoreApiClient} for a single attempt,
 * checks and parses the XML, and returns typed application records.
 * @module src/services/NCBI/core/ncbiService
 */

import type { AxiosInstance } from "axios";
import type { NcbiClientConfig } from "../../../config/index.js";
import type {
  ESearchResult,
  NcbiXmlDocument,
  ParsedArticle,
} from "../../../types-global/pubmedXml.js";
import {
  logger,
  type RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import {
  ensureArray,
  extractLinkedIds,
  getText,
  isXmlObject,
  parsePubmedArticleSet,
} from "../parsing/index.js";
import type {
  NcbiEndpoint,
  NcbiRequestOptions,
  NcbiRequestParams,
} from "./ncbiConstants.js";
import { NcbiCoreApiClient } from "./ncbiCoreApiClient.js";
import { NcbiResponseHandler } from "./ncbiResponseHandler.js";

export interface ESearchParams {
  term: string;
  retmax: number;
  sort?: "relevance" | "pub_date";
}

export interface EFetchParams {
  ids: readonly string[];
  rettype?: "abstract" | "medline";
}

export interface ELinkParams {
  id: string;
  linkname?: string;
}

/** Request-scoped inputs shared by every E-utility call. */
export interface NcbiCallScope {
  context: RequestContext;
  signal?: AbortSignal;
}

export const PUBMED_SIMILAR_LINKNAME = "pubmed_pubmed";

function toCount(value: string | undefined): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

export class NcbiService {
  private readonly apiClient: NcbiCoreApiClient;
  private readonly responseHandler: NcbiResponseHandler;

  constructor(apiClient: NcbiCoreApiClient) {
    this.apiClient = apiClient;
    this.responseHandler = new NcbiResponseHandler();
  }

  private async performNcbiRequest(
    endpoint: NcbiEndpoint,
    params: NcbiRequestParams,
    scope: NcbiCallScope,
    options: NcbiRequestOptions = {},
  ): Promise<NcbiXmlDocument> {
    const rawResponse = await this.apiClient.makeRequest(
      endpoint,
      params,
      scope.context,
      { retmode: "xml", ...options, signal: scope.signal },
    );
    return this.responseHandler.parseXmlResponse(
      rawResponse.data,
      endpoint,
      scope.context,
    );
  }

  public async eSearch(
    params: ESearchParams,
    scope: NcbiCallScope,
  ): Promise<ESearchResult> {
    const document = await this.performNcbiRequest(
      "esearch",
      {
        db: "pubmed",
        term: params.term,
        retmax: params.retmax,
        sort: params.sort,
        usehistory: "n",
      },
      scope,
    );

    const esResult = isXmlObject(document.eSearchResult)
      ? document.eSearchResult
      : undefined;
    const idListNode = esResult?.IdList;
    const idList = isXmlObject(idListNode)
      ? ensureArray(idListNode.Id).filter(Boolean)
      : [];
    const errorListNode = esResult?.ErrorList;
    const phrasesNotFound = isXmlObject(errorListNode)
      ? ensureArray(errorListNode.PhraseNotFound).map((p) => getText(p))
      : [];

    if (phrasesNotFound.length > 0) {
      logger.warning("ESearch reported phrases not found.", {
        ...scope.context,
        phrasesNotFound,
      });
    }

    return {
      count: toCount(esResult?.Count),
      retmax: toCount(esResult?.RetMax),
      retstart: toCount(esResult?.RetStart),
      idList,
      queryTranslation: getText(esResult?.QueryTranslation) || undefined,
      phrasesNotFound,
    };
  }

  /**
   * Fetches full PubMed records. Articles come back in the order of `ids`;
   * ids PubMed has no record for are left out.
   */
  public async eFetch(
    params: EFetchParams,
    scope: NcbiCallScope,
  ): Promise<ParsedArticle[]> {
    if (params.ids.length === 0) return [];

    const document = await this.performNcbiRequest(
      "efetch",
      { db: "pubmed", id: params.ids.join(",") },
      scope,
      { rettype: params.rettype ?? "abstract" },
    );

    const articles = parsePubmedArticleSet(document.PubmedArticleSet);
    const byPmid = new Map(articles.map((article) => [article.pmid, article]));
    return params.ids.flatMap((id) => {
      const article = byPmid.get(id);
      return article ? [article] : [];
    });
  }

  /**
   * Returns the ids linked to `params.id`, excluding the id itself, in NCBI's
   * relevance order.
   */
  public async eLink(
    params: ELinkParams,
    scope: NcbiCallScope,
  ): Promise<string[]> {
    const linkname = params.linkname ?? PUBMED_SIMILAR_LINKNAME;
    const document = await this.performNcbiRequest(
      "elink",
      {
        dbfrom: "pubmed",
        db: "pubmed",
        id: params.id,
        linkname,
        cmd: "neighbor",
      },
      scope,
    );
    return extractLinkedIds(document.eLinkResult, linkname, params.id);
  }
}

/**
 * Builds the service from configuration. Tests pass an axios instance backed
 * by an in-process adapter.
 */
export function createNcbiService(
  clientConfig: NcbiClientConfig,
  httpClient?: AxiosInstance,
): NcbiService {
  const service = new NcbiService(
    new NcbiCoreApiClient(clientConfig, httpClient),
  );
  logger.debug(
    "NcbiService initialized.",
    requestContextService.createRequestContext({
      service: "NcbiService",
      operation: "createNcbiService",
    }),
  );
  return service;
}

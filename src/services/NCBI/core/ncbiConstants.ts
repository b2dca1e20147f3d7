/**
 * @fileoverview Constants and shared type definitions for NCBI E-utility interactions.
 * @module src/services/NCBI/core/ncbiConstants
 */

export const NCBI_EUTILS_BASE_URL =
  "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";

/** The E-utility endpoints this service calls. */
export type NcbiEndpoint = "esearch" | "efetch" | "elink";

/**
 * Query parameters for one E-utility call. Identification parameters
 * (`tool`, `email`, `api_key`) are added by the core client.
 */
export interface NcbiRequestParams {
  db?: string;
  [key: string]: string | number | undefined;
}

export interface NcbiRequestOptions {
  retmode?: "xml" | "text";
  rettype?: string; // e.g. "abstract"
  /** Aborts the in-flight call when the inbound request goes away. */
  signal?: AbortSignal;
}

export const PUBMED_ARTICLE_BASE_URL = "https://pubmed.ncbi.nlm.nih.gov";

/**
 * @fileoverview Zod schemas for the JSON bodies of the POST endpoints.
 * @module src/api-server/validation/requestSchemas
 */

import { z } from "zod";

export const QUERY_MIN_LENGTH = 1;
export const QUERY_MAX_LENGTH = 500;
export const DEFAULT_MAX_RESULTS = 10;
export const SEARCH_MAX_RESULTS_LIMIT = 100;
export const SIMILAR_MAX_RESULTS_LIMIT = 50;
export const PMID_PATTERN = /^\d+$/;

export type RequestOperation = "search" | "publication" | "similar";

export interface SearchRequest {
  query: string;
  max_results: number;
}

export interface PublicationRequest {
  pmid: string;
}

export interface SimilarRequest {
  pmid: string;
  max_results: number;
}

export interface RequestByOperation {
  search: SearchRequest;
  publication: PublicationRequest;
  similar: SimilarRequest;
}

/** Counts code points, so an astral character such as an emoji counts once. */
export function characterLength(value: string): number {
  return [...value].length;
}

const querySchema = z
  .string()
  .superRefine((value, ctx) => {
    const length = characterLength(value);
    if (length < QUERY_MIN_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_small,
        minimum: QUERY_MIN_LENGTH,
        inclusive: true,
        type: "string",
      });
    } else if (length > QUERY_MAX_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_big,
        maximum: QUERY_MAX_LENGTH,
        inclusive: true,
        type: "string",
      });
    }
  })
  .describe("Search query using PubMed syntax, 1-500 characters.");

const pmidSchema = z
  .string()
  .regex(PMID_PATTERN)
  .describe("PubMed ID, digits only.");

const maxResultsSchema = (limit: number) =>
  z
    .number()
    .int()
    .min(1)
    .max(limit)
    .default(DEFAULT_MAX_RESULTS)
    .describe(`Maximum number of results, 1-${limit}. Defaults to 10.`);

export const SearchRequestSchema = z.object({
  query: querySchema,
  max_results: maxResultsSchema(SEARCH_MAX_RESULTS_LIMIT),
});

export const PublicationRequestSchema = z.object({
  pmid: pmidSchema,
});

export const SimilarRequestSchema = z.object({
  pmid: pmidSchema,
  max_results: maxResultsSchema(SIMILAR_MAX_RESULTS_LIMIT),
});

export const requestSchemas: {
  [K in RequestOperation]: z.ZodType<
    RequestByOperation[K],
    z.ZodTypeDef,
    unknown
  >;
} = {
  search: SearchRequestSchema,
  publication: PublicationRequestSchema,
  similar: SimilarRequestSchema,
};

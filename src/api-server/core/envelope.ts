/**
 * @fileoverview The `{success, data|error}` body every POST endpoint returns,
 * and the mapping from {@link AppError} codes to caller-facing messages and
 * HTTP status codes.
 * @module src/api-server/core/envelope
 */

import { AppError, BaseErrorCode } from "../../types-global/errors.js";

export interface SuccessEnvelope {
  success: true;
  data: string;
}

export interface FailureEnvelope {
  success: false;
  error: string;
}

export type ResponseEnvelope = SuccessEnvelope | FailureEnvelope;

export type EnvelopeStatus = 200 | 400 | 404 | 500 | 502 | 503;

export const INTERNAL_ERROR_MESSAGE = "Internal server error occurred";

export function successEnvelope(data: string): SuccessEnvelope {
  return { success: true, data };
}

export function failureEnvelope(error: string): FailureEnvelope {
  return { success: false, error };
}

export interface DescribedFailure {
  status: EnvelopeStatus;
  envelope: FailureEnvelope;
}

/**
 * Turns an error into what the caller sees. Upstream failures are prefixed with
 * `failurePrefix` (e.g. "Search failed"); internal errors never leak their message.
 */
export function describeFailure(
  error: AppError,
  failurePrefix: string,
): DescribedFailure {
  switch (error.code) {
    case BaseErrorCode.NO_RESULTS:
      return { status: 200, envelope: failureEnvelope(error.message) };
    case BaseErrorCode.NCBI_SERVICE_UNAVAILABLE:
    case BaseErrorCode.NCBI_TIMEOUT:
    case BaseErrorCode.NCBI_API_ERROR:
    case BaseErrorCode.NCBI_PARSING_ERROR:
      return {
        status: 502,
        envelope: failureEnvelope(`${failurePrefix}: ${error.message}`),
      };
    case BaseErrorCode.REQUEST_ABORTED:
      return {
        status: 503,
        envelope: failureEnvelope(`${failurePrefix}: ${error.message}`),
      };
    default:
      return { status: 500, envelope: failureEnvelope(INTERNAL_ERROR_MESSAGE) };
  }
}

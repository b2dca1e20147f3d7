/**
 * @fileoverview Defines standardized error codes and the custom error class used
 * across the API. Every failure that reaches the HTTP boundary is expressed as an
 * {@link AppError} so it can be mapped onto a response envelope and status code.
 * @module src/types-global/errors
 */

/**
 * Defines a set of standardized error codes for common issues within the API
 * and its communication with NCBI E-utilities.
 */
export enum BaseErrorCode {
  /** NCBI answered, but the result set was empty. */
  NO_RESULTS = "NO_RESULTS",
  /** NCBI could not be reached or answered with a non-2xx status. */
  NCBI_SERVICE_UNAVAILABLE = "NCBI_SERVICE_UNAVAILABLE",
  /** NCBI did not answer within the configured timeout. */
  NCBI_TIMEOUT = "NCBI_TIMEOUT",
  /** NCBI reported an error inside an otherwise successful response. */
  NCBI_API_ERROR = "NCBI_API_ERROR",
  /** The NCBI response body was not the XML we expected. */
  NCBI_PARSING_ERROR = "NCBI_PARSING_ERROR",
  /** The inbound request was cancelled before the upstream call finished. */
  REQUEST_ABORTED = "REQUEST_ABORTED",
  /** Environment configuration is missing or invalid. */
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
  /** A component failed while the server was starting. */
  INITIALIZATION_FAILED = "INITIALIZATION_FAILED",
  /** Anything unexpected. */
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * Custom error class for application-specific errors.
 * Carries a {@link BaseErrorCode} and optional structured details for logging.
 * Only `message` is ever shown to API callers.
 */
export class AppError extends Error {
  public readonly code: BaseErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: BaseErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

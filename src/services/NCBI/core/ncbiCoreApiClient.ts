/**
 * @fileoverview Core client for making HTTP requests to NCBI E-utilities.
 * Handles request construction, identification parameters, the deadline that
 * bounds each call, and mapping of transport failures onto {@link AppError}
 * codes. Each call is attempted once.
 * @module src/services/NCBI/core/ncbiCoreApiClient
 */

import axios, {
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
} from "axios";
import type { NcbiClientConfig } from "../../../config/index.js";
import { AppError, BaseErrorCode } from "../../../types-global/errors.js";
import {
  logger,
  type RequestContext,
  requestContextService,
  sanitizeInputForLogging,
} from "../../../utils/index.js";
import {
  NCBI_EUTILS_BASE_URL,
  type NcbiEndpoint,
  type NcbiRequestOptions,
  type NcbiRequestParams,
} from "./ncbiConstants.js";

/** `AbortSignal.timeout` aborts with a DOMException named `TimeoutError`. */
export function isTimeoutReason(reason: unknown): boolean {
  return (
    typeof reason === "object" &&
    reason !== null &&
    "name" in reason &&
    reason.name === "TimeoutError"
  );
}

export class NcbiCoreApiClient {
  private readonly clientConfig: NcbiClientConfig;
  private readonly axiosInstance: AxiosInstance;

  constructor(
    clientConfig: NcbiClientConfig,
    axiosInstance: AxiosInstance = axios.create(),
  ) {
    this.clientConfig = clientConfig;
    this.axiosInstance = axiosInstance;
  }

  /**
   * Issues a single GET to the given E-utility and returns the raw response
   * body as text. The call is aborted once `timeoutMs` has passed, however
   * much of the body has arrived, or as soon as `options.signal` aborts.
   * @throws {AppError} `REQUEST_ABORTED`, `NCBI_TIMEOUT` or
   *   `NCBI_SERVICE_UNAVAILABLE`.
   */
  public async makeRequest(
    endpoint: NcbiEndpoint,
    params: NcbiRequestParams,
    context: RequestContext,
    options: NcbiRequestOptions = {},
  ): Promise<AxiosResponse<string>> {
    const rawParams: Record<string, string | number | undefined> = {
      tool: this.clientConfig.toolName,
      email: this.clientConfig.email,
      api_key: this.clientConfig.apiKey,
      retmode: options.retmode,
      rettype: options.rettype,
      ...params,
    };

    const finalParams: Record<string, string> = {};
    for (const [key, value] of Object.entries(rawParams)) {
      if (value !== undefined && value !== "") {
        finalParams[key] = String(value);
      }
    }

    const deadline = AbortSignal.timeout(this.clientConfig.timeoutMs);
    const signal = options.signal
      ? AbortSignal.any([options.signal, deadline])
      : deadline;

    const requestConfig: AxiosRequestConfig = {
      method: "GET",
      url: `${NCBI_EUTILS_BASE_URL}/${endpoint}.fcgi`,
      params: finalParams,
      responseType: "text",
      signal,
    };

    const requestContext = requestContextService.createRequestContext({
      ...context,
      operation: "NCBI_HttpRequest",
      endpoint,
    });

    logger.debug(`Making NCBI HTTP request: GET ${requestConfig.url}`, {
      ...requestContext,
      requestParams: sanitizeInputForLogging(finalParams),
    });

    try {
      return await this.axiosInstance.request<string>(requestConfig);
    } catch (error: unknown) {
      throw this.toAppError(error, endpoint, requestContext, signal);
    }
  }

  private toAppError(
    error: unknown,
    endpoint: NcbiEndpoint,
    context: RequestContext,
    signal: AbortSignal,
  ): AppError {
    // Depending on the adapter an abort surfaces as a CanceledError or as the
    // signal's reason, so the signal decides.
    if (signal.aborted || axios.isCancel(error)) {
      if (isTimeoutReason(signal.reason)) {
        logger.warning(`NCBI request to ${endpoint} hit its deadline.`, {
          ...context,
          timeoutMs: this.clientConfig.timeoutMs,
        });
        return new AppError(
          BaseErrorCode.NCBI_TIMEOUT,
          `PubMed did not respond within ${this.clientConfig.timeoutMs}ms.`,
          { endpoint },
        );
      }
      logger.notice(`NCBI request to ${endpoint} was cancelled.`, context);
      return new AppError(
        BaseErrorCode.REQUEST_ABORTED,
        "The request was cancelled before PubMed responded.",
        { endpoint },
      );
    }

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      logger.error(`Axios error during NCBI request to ${endpoint}`, error, {
        ...context,
        code: error.code,
        status,
      });

      if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
        return new AppError(
          BaseErrorCode.NCBI_TIMEOUT,
          `PubMed did not respond within ${this.clientConfig.timeoutMs}ms.`,
          { endpoint },
        );
      }
      if (status !== undefined) {
        return new AppError(
          BaseErrorCode.NCBI_SERVICE_UNAVAILABLE,
          `PubMed responded with HTTP ${status}.`,
          { endpoint, status },
        );
      }
      return new AppError(
        BaseErrorCode.NCBI_SERVICE_UNAVAILABLE,
        "PubMed could not be reached.",
        { endpoint, code: error.code },
      );
    }

    if (error instanceof AppError) return error;

    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`Unexpected error during NCBI request to ${endpoint}`, err, {
      ...context,
    });
    return new AppError(
      BaseErrorCode.INTERNAL_ERROR,
      `Unexpected error communicating with NCBI: ${err.message}`,
      { endpoint },
    );
  }
}

/**
 * @fileoverview Centralized error processing. Normalizes any thrown value into an
 * {@link AppError} and logs it once with its request context.
 * @module src/utils/internal/errorHandler
 */

import axios from "axios";
import { AppError, BaseErrorCode } from "../../types-global/errors.js";
import { sanitizeInputForLogging } from "../security/sanitization.js";
import { logger } from "./logger.js";
import type { RequestContext } from "./requestContext.js";

export interface ErrorHandlerOptions {
  /** Name of the operation that failed, used in the log line. */
  operation: string;
  context?: RequestContext;
  /** Input of the failed operation; redacted before logging. */
  input?: unknown;
  /** Log at `crit` instead of `error`. */
  critical?: boolean;
}

export class ErrorHandler {
  public static getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === "string") return error;
    return String(error);
  }

  /**
   * Picks a code for a foreign error. `AppError` keeps its own code.
   */
  public static determineErrorCode(error: unknown): BaseErrorCode {
    if (error instanceof AppError) return error.code;
    if (axios.isCancel(error)) return BaseErrorCode.REQUEST_ABORTED;
    if (error instanceof Error && error.name === "AbortError") {
      return BaseErrorCode.REQUEST_ABORTED;
    }
    return BaseErrorCode.INTERNAL_ERROR;
  }

  public static handleError(
    error: unknown,
    options: ErrorHandlerOptions,
  ): AppError {
    const { operation, context, input, critical } = options;

    const normalized =
      error instanceof AppError
        ? error
        : new AppError(
            ErrorHandler.determineErrorCode(error),
            ErrorHandler.getErrorMessage(error),
            {
              originalErrorName:
                error instanceof Error ? error.name : typeof error,
            },
          );

    const logContext: Record<string, unknown> = {
      ...context,
      operation,
      errorCode: normalized.code,
      errorDetails: sanitizeInputForLogging(normalized.details),
    };
    if (input !== undefined) {
      logContext.input = sanitizeInputForLogging(input);
    }

    const cause = error instanceof Error ? error : normalized;
    if (critical) {
      logger.crit(`Critical error in ${operation}: ${normalized.message}`, cause, logContext);
    } else {
      logger.error(`Error in ${operation}: ${normalized.message}`, cause, logContext);
    }

    return normalized;
  }
}

/**
 * @fileoverview Last-resort error boundary for the Hono app. Anything a route
 * did not turn into an envelope itself ends up here and is answered with a
 * generic failure envelope; the process keeps serving.
 * @module src/api-server/transports/httpErrorHandler
 */

import type { Context } from "hono";
import { ErrorHandler, requestContextService } from "../../utils/index.js";
import { describeFailure } from "../core/envelope.js";

export const httpErrorHandler = (err: Error, c: Context): Response => {
  const context = requestContextService.createRequestContext({
    operation: "httpErrorHandler",
    method: c.req.method,
    path: c.req.path,
  });
  const handledError = ErrorHandler.handleError(err, {
    operation: "httpErrorHandler",
    context,
    critical: true,
  });
  const { status, envelope } = describeFailure(handledError, "Request failed");
  return c.json(envelope, status);
};

/**
 * @fileoverview Builds the Hono handler shared by every POST endpoint:
 * read JSON, validate, run the route logic under measurement, and answer with
 * a response envelope. Route modules only supply their logic.
 * @module src/api-server/core/routeHandler
 */

import type { Context } from "hono";
import type { NcbiService } from "../../services/NCBI/core/ncbiService.js";
import { AppError, BaseErrorCode } from "../../types-global/errors.js";
import {
  ErrorHandler,
  logger,
  measureRouteExecution,
  type RequestContext,
  requestContextService,
  type TracerIdentity,
} from "../../utils/index.js";
import type {
  RequestByOperation,
  RequestOperation,
} from "../validation/requestSchemas.js";
import { validateRequest } from "../validation/requestValidator.js";
import {
  describeFailure,
  failureEnvelope,
  successEnvelope,
} from "./envelope.js";

/** Stateless collaborators shared by all requests. */
export interface RouteDependencies {
  ncbiService: NcbiService;
  /** Bounds all upstream work of one request, across every E-utility call. */
  upstreamTimeoutMs: number;
  tracer: TracerIdentity;
}

/** What a route's logic receives besides its validated input. */
export interface RouteLogicScope {
  context: RequestContext;
  /** Aborted when the caller disconnects or the upstream deadline passes. */
  signal: AbortSignal;
  ncbiService: NcbiService;
}

/** Resolves to the markdown placed in `data`. */
export type RouteLogic<Op extends RequestOperation> = (
  input: RequestByOperation[Op],
  scope: RouteLogicScope,
) => Promise<string>;

export interface EnvelopeRouteDefinition<Op extends RequestOperation> {
  operation: Op;
  /** Used for spans, metrics and log lines. */
  routeName: string;
  /** Prepended to upstream failure messages, e.g. "Search failed". */
  failurePrefix: string;
  logic: RouteLogic<Op>;
}

export const INVALID_JSON_MESSAGE = "Request body must be valid JSON.";

export function createEnvelopeHandler<Op extends RequestOperation>(
  definition: EnvelopeRouteDefinition<Op>,
  deps: RouteDependencies,
): (c: Context) => Promise<Response> {
  const { operation, routeName, failurePrefix, logic } = definition;

  return async (c: Context): Promise<Response> => {
    const context = requestContextService.createRequestContext({
      operation: routeName,
      method: c.req.method,
      path: c.req.path,
    });

    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      logger.notice("Rejected request with malformed JSON body.", {
        ...context,
        reason: ErrorHandler.getErrorMessage(error),
      });
      return c.json(failureEnvelope(INVALID_JSON_MESSAGE), 400);
    }

    const validation = validateRequest(operation, body);
    if (!validation.ok) {
      logger.notice("Request validation failed.", {
        ...context,
        field: validation.failure.field,
        constraint: validation.failure.constraint,
      });
      return c.json(failureEnvelope(validation.failure.message), 400);
    }
    const input = validation.value;

    const signal = AbortSignal.any([
      c.req.raw.signal,
      AbortSignal.timeout(deps.upstreamTimeoutMs),
    ]);

    try {
      const markdown = await measureRouteExecution(
        () =>
          logic(input, {
            context,
            signal,
            ncbiService: deps.ncbiService,
          }),
        { ...context, routeName },
        input,
        deps.tracer,
      );
      return c.json(successEnvelope(markdown), 200);
    } catch (error) {
      if (error instanceof AppError && error.code === BaseErrorCode.NO_RESULTS) {
        logger.info(error.message, { ...context, errorCode: error.code });
        const { status, envelope } = describeFailure(error, failurePrefix);
        return c.json(envelope, status);
      }
      const handledError = ErrorHandler.handleError(error, {
        operation: routeName,
        context,
        input,
      });
      const { status, envelope } = describeFailure(handledError, failurePrefix);
      return c.json(envelope, status);
    }
  };
}

/**
 * @fileoverview Performance monitoring for route execution.
 * Wraps a route's core logic in an OpenTelemetry span, measures its execution
 * time, and logs a structured metrics event. Without a registered SDK the
 * tracer is a no-op and only the log line remains.
 * @module src/utils/internal/performance
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";
import { AppError } from "../../types-global/errors.js";
import {
  ATTR_CODE_FUNCTION,
  ATTR_CODE_NAMESPACE,
  ATTR_ROUTE_DURATION_MS,
  ATTR_ROUTE_ERROR_CODE,
  ATTR_ROUTE_INPUT_BYTES,
  ATTR_ROUTE_OUTPUT_BYTES,
  ATTR_ROUTE_SUCCESS,
} from "../telemetry/semconv.js";
import { logger } from "./logger.js";
import type { RequestContext } from "./requestContext.js";

export interface TracerIdentity {
  serviceName: string;
  serviceVersion: string;
}

function getPayloadSize(payload: unknown): number {
  if (payload === undefined || payload === null) return 0;
  if (typeof payload === "string") return Buffer.byteLength(payload, "utf8");
  const stringified = JSON.stringify(payload);
  return stringified === undefined ? 0 : Buffer.byteLength(stringified, "utf8");
}

/**
 * Runs `routeLogicFn` inside a span named `route_execution:<routeName>`.
 * Errors are recorded on the span and rethrown unchanged.
 */
export async function measureRouteExecution<T>(
  routeLogicFn: () => Promise<T>,
  context: RequestContext & { routeName: string },
  inputPayload: unknown,
  tracerIdentity: TracerIdentity,
): Promise<T> {
  const tracer = trace.getTracer(
    tracerIdentity.serviceName,
    tracerIdentity.serviceVersion,
  );
  const { routeName } = context;

  return tracer.startActiveSpan(`route_execution:${routeName}`, async (span) => {
    const inputBytes = getPayloadSize(inputPayload);
    span.setAttributes({
      [ATTR_CODE_FUNCTION]: routeName,
      [ATTR_CODE_NAMESPACE]: "api-routes",
      [ATTR_ROUTE_INPUT_BYTES]: inputBytes,
    });

    const startTime = process.hrtime.bigint();
    let isSuccess = false;
    let errorCode: string | undefined;
    let outputBytes = 0;

    try {
      const result = await routeLogicFn();
      isSuccess = true;
      outputBytes = getPayloadSize(result);
      span.setStatus({ code: SpanStatusCode.OK });
      span.setAttribute(ATTR_ROUTE_OUTPUT_BYTES, outputBytes);
      return result;
    } catch (error) {
      if (error instanceof AppError) {
        errorCode = error.code;
      } else if (error instanceof Error) {
        errorCode = "UNHANDLED_ERROR";
        span.recordException(error);
      } else {
        errorCode = "UNKNOWN_ERROR";
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      const durationMs =
        Number(process.hrtime.bigint() - startTime) / 1_000_000;
      const roundedDuration = parseFloat(durationMs.toFixed(2));

      span.setAttributes({
        [ATTR_ROUTE_DURATION_MS]: roundedDuration,
        [ATTR_ROUTE_SUCCESS]: isSuccess,
      });
      if (errorCode) {
        span.setAttribute(ATTR_ROUTE_ERROR_CODE, errorCode);
      }
      span.end();

      logger.info("Route execution finished.", {
        ...context,
        metrics: {
          durationMs: roundedDuration,
          isSuccess,
          errorCode,
          inputBytes,
          outputBytes,
        },
      });
    }
  });
}

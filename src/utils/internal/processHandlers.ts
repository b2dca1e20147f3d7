/**
 * @fileoverview Process-level event wiring. Termination signals and uncaught
 * exceptions both end in the graceful shutdown; the exception exits non-zero.
 * @module src/utils/internal/processHandlers
 */

import { logger } from "./logger.js";
import { requestContextService } from "./requestContext.js";

/** Stops the server and exits the process with `exitCode`. */
export type ShutdownHandler = (
  trigger: string,
  exitCode: number,
) => Promise<void>;

/** The part of `process` the handlers attach to. */
export interface ProcessEventSource {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
}

const TERMINATION_SIGNALS = ["SIGTERM", "SIGINT"] as const;

const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

export function registerProcessHandlers(
  source: ProcessEventSource,
  shutdown: ShutdownHandler,
): void {
  for (const signal of TERMINATION_SIGNALS) {
    source.on(signal, () => void shutdown(signal, 0));
  }

  source.on("uncaughtException", (error: unknown) => {
    const errorContext = requestContextService.createRequestContext({
      operation: "UncaughtExceptionHandler",
    });
    logger.crit(
      "Uncaught exception detected. Shutting down.",
      toError(error),
      errorContext,
    );
    void shutdown("uncaughtException", 1);
  });

  source.on("unhandledRejection", (reason: unknown) => {
    const errorContext = requestContextService.createRequestContext({
      operation: "UnhandledRejectionHandler",
    });
    logger.error(
      "Unhandled promise rejection detected.",
      toError(reason),
      errorContext,
    );
  });
}

/**
 * @fileoverview Utilities for creating and managing request contexts.
 * A request context is a plain object that travels with an operation and is
 * attached to every log line it produces, so that all lines of one HTTP request
 * share a `requestId`.
 * @module src/utils/internal/requestContext
 */

import { randomUUID } from "node:crypto";

/**
 * Defines the structure for context information associated with a request or operation.
 */
export interface RequestContext {
  /** Unique identifier for the request, used for log correlation. */
  requestId: string;
  /** ISO 8601 timestamp of when the context was created. */
  timestamp: string;
  /** Any other operation-specific fields. */
  [key: string]: unknown;
}

/**
 * Process-level identity recorded at start-up. The logger stamps it on every line.
 */
export interface ContextConfig {
  appName?: string;
  appVersion?: string;
  environment?: string;
}

let serviceConfig: ContextConfig = {};

/**
 * Singleton-like service object for managing request context operations.
 */
export const requestContextService = {
  /**
   * Sets the process identity. Called once during start-up.
   */
  configure(config: ContextConfig): ContextConfig {
    serviceConfig = { ...serviceConfig, ...config };
    return { ...serviceConfig };
  },

  getConfig(): ContextConfig {
    return { ...serviceConfig };
  },

  /**
   * Creates a new request context. A `requestId` already present in
   * `additionalContext` (e.g. spread from a parent context) is preserved;
   * otherwise a fresh UUID is generated.
   */
  createRequestContext(
    additionalContext: Record<string, unknown> = {},
  ): RequestContext {
    const inheritedId = additionalContext.requestId;
    const requestId =
      typeof inheritedId === "string" && inheritedId.length > 0
        ? inheritedId
        : randomUUID();

    return {
      ...additionalContext,
      requestId,
      timestamp: new Date().toISOString(),
    };
  },
};

/**
 * @fileoverview Registration for the liveness probe (`GET /health`) and the
 * service description (`GET /`). Neither touches NCBI.
 * @module src/api-server/routes/health/registration
 */

import type { Hono } from "hono";
import { logger, type RequestContext } from "../../../utils/index.js";

export interface ServiceIdentity {
  name: string;
  version: string;
  description: string;
}

export interface HealthResponse {
  status: "healthy";
  service: string;
  version: string;
  timestamp: string;
}

export interface ServiceInfo {
  name: string;
  version: string;
  description: string;
  endpoints: string[];
}

export const SERVICE_ENDPOINTS = [
  "GET /",
  "GET /health",
  "POST /search",
  "POST /publication",
  "POST /similar",
];

export function registerHealthRoutes(
  app: Hono,
  identity: ServiceIdentity,
  context: RequestContext,
): void {
  app.get("/health", (c) => {
    const body: HealthResponse = {
      status: "healthy",
      service: identity.name,
      version: identity.version,
      timestamp: new Date().toISOString(),
    };
    return c.json(body, 200);
  });

  app.get("/", (c) => {
    const body: ServiceInfo = {
      name: identity.name,
      version: identity.version,
      description: identity.description,
      endpoints: [...SERVICE_ENDPOINTS],
    };
    return c.json(body, 200);
  });

  logger.debug("Routes 'GET /health' and 'GET /' registered.", context);
}

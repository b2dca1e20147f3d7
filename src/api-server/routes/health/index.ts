/**
 * @fileoverview Barrel file for the health and service info routes.
 * @module src/api-server/routes/health/index
 */

export {
  registerHealthRoutes,
  SERVICE_ENDPOINTS,
  type HealthResponse,
  type ServiceIdentity,
  type ServiceInfo,
} from "./registration.js";

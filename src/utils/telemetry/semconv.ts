/**
 * @fileoverview Local OpenTelemetry attribute names, kept here so span attributes
 * do not depend on the incubating entry point of
 * `@opentelemetry/semantic-conventions`.
 * @module src/utils/telemetry/semconv
 */

/**
 * The method or function name, or equivalent (usually rightmost part of the code unit's name).
 */
export const ATTR_CODE_FUNCTION = "code.function";

/**
 * The "namespace" within which `code.function` is defined.
 */
export const ATTR_CODE_NAMESPACE = "code.namespace";

export const ATTR_ROUTE_DURATION_MS = "api.route.duration_ms";
export const ATTR_ROUTE_SUCCESS = "api.route.success";
export const ATTR_ROUTE_ERROR_CODE = "api.route.error_code";
export const ATTR_ROUTE_INPUT_BYTES = "api.route.input_bytes";
export const ATTR_ROUTE_OUTPUT_BYTES = "api.route.output_bytes";

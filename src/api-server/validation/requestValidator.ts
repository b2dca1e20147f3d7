/**
 * @fileoverview Validates raw request bodies against the operation schemas and
 * turns the first Zod issue into a field-level failure.
 * @module src/api-server/validation/requestValidator
 */

import type { z } from "zod";
import {
  PMID_PATTERN,
  type RequestByOperation,
  type RequestOperation,
  requestSchemas,
} from "./requestSchemas.js";

export type ValidationConstraint =
  | "required"
  | "type"
  | "min_length"
  | "max_length"
  | "minimum"
  | "maximum"
  | "pattern";

export interface ValidationFailure {
  /** Offending field; `body` when the body itself is not an object. */
  field: string;
  constraint: ValidationConstraint;
  message: string;
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: ValidationFailure };

const EXPECTED_TYPE_LABELS: Record<string, string> = {
  string: "a string",
  number: "an integer",
  integer: "an integer",
  object: "an object",
};

function describeIssue(issue: z.ZodIssue): ValidationFailure {
  const field = issue.path.length > 0 ? issue.path.map(String).join(".") : "body";

  switch (issue.code) {
    case "invalid_type":
      if (field === "body") {
        return {
          field,
          constraint: "type",
          message: "Request body must be a JSON object.",
        };
      }
      if (issue.received === "undefined") {
        return {
          field,
          constraint: "required",
          message: `Missing required field '${field}'.`,
        };
      }
      return {
        field,
        constraint: "type",
        message: `Field '${field}' must be ${EXPECTED_TYPE_LABELS[issue.expected] ?? issue.expected}.`,
      };
    case "too_small":
      return issue.type === "string"
        ? {
            field,
            constraint: "min_length",
            message: `Field '${field}' must be at least ${issue.minimum} character${issue.minimum === 1 ? "" : "s"} long.`,
          }
        : {
            field,
            constraint: "minimum",
            message: `Field '${field}' must be greater than or equal to ${issue.minimum}.`,
          };
    case "too_big":
      return issue.type === "string"
        ? {
            field,
            constraint: "max_length",
            message: `Field '${field}' must be at most ${issue.maximum} characters long.`,
          }
        : {
            field,
            constraint: "maximum",
            message: `Field '${field}' must be less than or equal to ${issue.maximum}.`,
          };
    case "invalid_string":
      return {
        field,
        constraint: "pattern",
        message: `Field '${field}' must match the pattern ${PMID_PATTERN.source}.`,
      };
    default:
      return { field, constraint: "type", message: issue.message };
  }
}

/**
 * Checks `body` against the schema of `operation`. Pure: no I/O, no logging.
 * Only the first violation is reported.
 */
export function validateRequest<Op extends RequestOperation>(
  operation: Op,
  body: unknown,
): ValidationResult<RequestByOperation[Op]> {
  const result = requestSchemas[operation].safeParse(body);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  const [firstIssue] = result.error.issues;
  if (!firstIssue) {
    return {
      ok: false,
      failure: {
        field: "body",
        constraint: "type",
        message: "Request body is invalid.",
      },
    };
  }
  return { ok: false, failure: describeIssue(firstIssue) };
}

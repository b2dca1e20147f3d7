/**
 * @fileoverview Redaction of sensitive values before they are written to logs.
 * NCBI identification parameters (`api_key`, `email`) travel on every upstream
 * request, so request parameters must pass through here before logging.
 * @module src/utils/security/sanitization
 */

const REDACTED = "[REDACTED]";

const DEFAULT_SENSITIVE_FIELDS = [
  "api_key",
  "apikey",
  "email",
  "password",
  "token",
  "secret",
  "authorization",
  "credential",
];

export class Sanitization {
  private sensitiveFields: string[] = [...DEFAULT_SENSITIVE_FIELDS];

  /**
   * Adds field names (case-insensitive substrings) to redact.
   */
  public setSensitiveFields(fields: string[]): void {
    const merged = new Set([
      ...this.sensitiveFields,
      ...fields.map((f) => f.toLowerCase()),
    ]);
    this.sensitiveFields = [...merged];
  }

  public getSensitiveFields(): string[] {
    return [...this.sensitiveFields];
  }

  /**
   * Returns a deep copy of `input` with every sensitive field replaced.
   * Primitives are returned unchanged. A reference back to an enclosing object
   * becomes "[Circular]".
   */
  public sanitizeForLogging(input: unknown): unknown {
    return this.redact(input, new WeakSet<object>());
  }

  private isSensitive(key: string): boolean {
    const lower = key.toLowerCase();
    return this.sensitiveFields.some((field) => lower.includes(field));
  }

  /** `ancestors` holds the objects on the path from the root to `value`. */
  private redact(value: unknown, ancestors: WeakSet<object>): unknown {
    if (value === null || typeof value !== "object") {
      return value;
    }
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    if (ancestors.has(value)) {
      return "[Circular]";
    }

    ancestors.add(value);
    let result: unknown;
    if (Array.isArray(value)) {
      result = value.map((item) => this.redact(item, ancestors));
    } else {
      const copy: Record<string, unknown> = {};
      for (const [key, nested] of Object.entries(value)) {
        copy[key] = this.isSensitive(key)
          ? REDACTED
          : this.redact(nested, ancestors);
      }
      result = copy;
    }
    ancestors.delete(value);
    return result;
  }
}

export const sanitization = new Sanitization();

export const sanitizeInputForLogging = (input: unknown): unknown =>
  sanitization.sanitizeForLogging(input);

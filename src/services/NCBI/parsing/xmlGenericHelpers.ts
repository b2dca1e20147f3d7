/**
 * @fileoverview Generic helper functions for reading the objects
 * fast-xml-parser produces.
 * @module src/services/NCBI/parsing/xmlGenericHelpers
 */

/**
 * Narrows a parsed XML node to a plain object (elements with children or attributes).
 */
export function isXmlObject<T>(
  value: T,
): value is Exclude<T, string | number | boolean | null | undefined | readonly unknown[]> &
  Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Ensures that the input is an array. If it's not an array, it wraps it in one.
 * Handles undefined or null by returning an empty array.
 */
export function ensureArray<T>(item: T | T[] | undefined | null): T[] {
  if (item === undefined || item === null) {
    return [];
  }
  return Array.isArray(item) ? item : [item];
}

/**
 * Safely extracts text content from an XML element, which might be a string or
 * an object with a "#text" property.
 * @param defaultValue - Returned when no text can be extracted.
 */
export function getText(element: unknown, defaultValue = ""): string {
  if (element === undefined || element === null) {
    return defaultValue;
  }
  if (typeof element === "string") {
    return element;
  }
  if (typeof element === "number" || typeof element === "boolean") {
    return String(element);
  }
  if (isXmlObject(element)) {
    const val = element["#text"];
    if (typeof val === "string") return val;
    if (typeof val === "number" || typeof val === "boolean") return String(val);
  }
  return defaultValue;
}

/**
 * Safely extracts an attribute value from an XML element.
 * Attributes are prefixed with "@_" by the parser configuration.
 * @param attributeName - Name without the prefix (e.g. "IdType").
 */
export function getAttribute(
  element: unknown,
  attributeName: string,
  defaultValue = "",
): string {
  if (isXmlObject(element)) {
    const val = element[`@_${attributeName}`];
    if (typeof val === "string") return val;
    if (typeof val === "boolean" || typeof val === "number") return String(val);
  }
  return defaultValue;
}

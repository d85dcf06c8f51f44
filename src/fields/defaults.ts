/**
 * Default value resolution.
 */

import type { DefaultValue, FieldDeclaration } from "../types/field.js";

const isProducer = (
  value: DefaultValue<unknown> | undefined,
): value is () => unknown => typeof value === "function";

/**
 * Returns the initial value for a field that was given no value at build time.
 *
 * Producers are invoked on every call, so each document gets its own object.
 * Static defaults are returned as declared; a static object is therefore
 * shared by every document that receives it.
 */
export const resolveDefault = (field: FieldDeclaration): unknown => {
  if (!field.hasDefault) return null;
  const value = field.default;
  return isProducer(value) ? value() : (value ?? null);
};

/**
 * `field()` helper for declaring fields inside `defineModel({ fields })`.
 */

import type {
  FieldOptions,
  FieldSpec,
  FieldType,
  FieldValueMap,
  Serializer,
} from "../types/field.js";

/**
 * Builds a field spec.
 *
 * @example
 * ```ts
 * const Address = defineModel({
 *   name: "Address",
 *   fields: {
 *     city: "string",
 *     visits: field("integer", { default: 0 }),
 *     tags: field("serialized", { default: () => [] }),
 *     movedIn: field("serialized", { serializer: usDateSerializer }),
 *   },
 * });
 * ```
 */
export function field<V>(
  type: "serialized",
  options: FieldOptions<V> & { readonly serializer: Serializer<V> },
): FieldSpec<"serialized", V>;
export function field<T extends FieldType>(
  type: T,
  options?: FieldOptions<FieldValueMap[T]>,
): FieldSpec<T, FieldValueMap[T]>;
export function field(
  type: FieldType,
  options: FieldOptions = {},
): FieldSpec<FieldType, unknown> {
  return Object.freeze({ type, options: Object.freeze({ ...options }) });
}

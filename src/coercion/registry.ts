/**
 * Entry points of the type coercion registry.
 *
 * `null` and `undefined` map to `null` in every direction for every type,
 * including fields with a custom serializer.
 */

import type { FieldDeclaration } from "../types/field.js";
import { COERCERS } from "./coercers.js";

const isAbsent = (value: unknown): value is null | undefined =>
  value === null || value === undefined;

/**
 * Coerces application input into the field's domain type.
 *
 * @throws {TypeCastError} when the input cannot be read as the field's type
 *
 * @example
 * ```ts
 * castValue(countField, "101"); // 101
 * ```
 */
export const castValue = (field: FieldDeclaration, input: unknown): unknown =>
  isAbsent(input) ? null : COERCERS[field.type].cast(input, field);

/**
 * Converts a domain value into the value written to DynamoDB.
 *
 * @throws {TypeCastError} when the value is not valid for the field's type
 */
export const dumpValue = (field: FieldDeclaration, value: unknown): unknown =>
  isAbsent(value) ? null : COERCERS[field.type].dump(value, field);

/**
 * Converts a value read from DynamoDB into the field's domain type.
 *
 * @throws {TypeCastError} when the stored value cannot be read as the field's type
 */
export const loadValue = (field: FieldDeclaration, wire: unknown): unknown =>
  isAbsent(wire) ? null : COERCERS[field.type].load(wire, field);

/**
 * Whether writes to this field are validated eagerly. `raw` and `serialized`
 * values pass through untouched until they are dumped.
 */
export const castsOnWrite = (field: FieldDeclaration): boolean =>
  field.type !== "raw" && field.type !== "serialized";

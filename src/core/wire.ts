/**
 * Conversions between documents and wire records (DynamoDB items in
 * DocumentClient form, keyed by stored attribute name).
 */

import { dumpValue, loadValue } from "../coercion/registry.js";
import { getConfig } from "../config/config.js";
import type { Document } from "../document/document.js";
import type { FieldRegistry } from "../fields/registry.js";
import type { FieldMetadata } from "../types/field.js";
import {
  type AttributeShape,
  type ModelDefinition,
  type WriteOptions,
  TIMESTAMP_FIELDS,
} from "../types/model.js";

/** Whether a field takes part in synchronization under the current settings. */
export const isSynchronized = (name: string): boolean =>
  getConfig().timestamps || !TIMESTAMP_FIELDS.includes(name);

/**
 * Dumps a document's attributes, keyed by stored name.
 *
 * With `partial`, only fields changed since the last clean point are
 * included. Timestamp fields are left out while timestamps are disabled.
 *
 * @throws {TypeCastError} when a value cannot be dumped
 */
export const attributesForWrite = <A extends AttributeShape>(
  doc: Document<A>,
  options?: WriteOptions,
): Record<string, unknown> => {
  const changed = options?.partial ? doc.changedFields() : undefined;
  const result: Record<string, unknown> = {};
  for (const field of doc.model.fields.fieldSet()) {
    if (!isSynchronized(field.name)) continue;
    if (changed && !changed.has(field.name)) continue;
    result[field.storedAs] = dumpValue(field, doc.readAttribute(field.name));
  }
  return result;
};

/**
 * Loads every declared field of `registry` from a wire record. Attributes
 * the registry does not know are ignored; missing ones load as `null`.
 */
export const loadAttributes = (
  registry: FieldRegistry,
  record: Readonly<Record<string, unknown>>,
): Record<string, unknown> => {
  const values: Record<string, unknown> = {};
  for (const field of registry.fieldSet()) {
    values[field.name] = loadValue(field, record[field.storedAs]);
  }
  return values;
};

/**
 * Picks the model a wire record belongs to: the descendant named by the
 * record's inheritance field, or `model` itself.
 */
export const resolveModelFor = (
  model: ModelDefinition,
  record: Readonly<Record<string, unknown>>,
): ModelDefinition => {
  const discriminator = model.fields.find(model.inheritanceField);
  if (!discriminator) return model;
  const typeName = record[discriminator.storedAs];
  if (typeof typeName !== "string" || typeName === model.name) return model;
  return model.descendants().find((child) => child.name === typeName) ?? model;
};

/** Introspection view of a model's fields, in field order. */
export const fieldMetadata = (registry: FieldRegistry): readonly FieldMetadata[] =>
  Object.freeze(
    registry.fieldSet().map((field) =>
      Object.freeze({
        name: field.name,
        type: field.type,
        hasDefault: field.hasDefault,
        storedAs: field.storedAs,
      }),
    ),
  );

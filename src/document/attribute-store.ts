/**
 * Per-document attribute values, keyed by field name.
 *
 * Every access is checked against the model's field registry, so reads and
 * writes of removed or never-declared fields fail immediately. A field that
 * was declared after the document was built reads as `null`.
 *
 * While timestamps are disabled, `createdAt` and `updatedAt` hold `null`
 * whatever is written to them.
 */

import { castValue, castsOnWrite } from "../coercion/registry.js";
import { isSynchronized } from "../core/wire.js";
import { UnknownFieldError } from "../errors/errors.js";
import type { FieldRegistry } from "../fields/registry.js";
import { resolveDefault } from "../fields/defaults.js";

export interface AttributeStore {
  /** @throws {UnknownFieldError} */
  readonly get: (name: string) => unknown;
  /**
   * Casts and stores a value, returning what was stored.
   *
   * @throws {UnknownFieldError}
   * @throws {TypeCastError}
   */
  readonly set: (name: string, value: unknown) => unknown;
  /** Stores an already-coerced value without casting. */
  readonly put: (name: string, value: unknown) => void;
  /** Reads a value without consulting the registry. */
  readonly peek: (name: string) => unknown;
  /**
   * Fills every field of the registry: explicit input first, defaults for the
   * rest. An explicit `null` counts as a value; `undefined` does not.
   *
   * @returns names of the fields that ended up non-null
   */
  readonly seed: (input: Readonly<Record<string, unknown>>) => readonly string[];
  /** Current values of every declared field, in field order. */
  readonly snapshot: () => Record<string, unknown>;
  /** Drops values of fields no longer declared. */
  readonly prune: () => void;
}

export const createAttributeStore = (registry: FieldRegistry): AttributeStore => {
  const values = new Map<string, unknown>();

  const peek = (name: string): unknown =>
    isSynchronized(name) ? (values.get(name) ?? null) : null;

  const set = (name: string, value: unknown): unknown => {
    const field = registry.get(name);
    const stored = !isSynchronized(name)
      ? null
      : castsOnWrite(field)
        ? castValue(field, value)
        : (value ?? null);
    values.set(name, stored);
    return stored;
  };

  return Object.freeze({
    get: (name: string) => {
      registry.get(name);
      return peek(name);
    },

    set,

    put: (name: string, value: unknown) => {
      registry.get(name);
      values.set(name, isSynchronized(name) ? value : null);
    },

    peek,

    seed: (input: Readonly<Record<string, unknown>>) => {
      for (const name of Object.keys(input)) {
        if (input[name] !== undefined && !registry.has(name)) {
          throw new UnknownFieldError(registry.modelName, name);
        }
      }

      const present: string[] = [];
      for (const field of registry.fieldSet()) {
        const explicit = input[field.name];
        const stored = set(
          field.name,
          explicit === undefined ? resolveDefault(field) : explicit,
        );
        if (stored !== null) present.push(field.name);
      }
      return present;
    },

    snapshot: () => {
      const result: Record<string, unknown> = {};
      for (const field of registry.fieldSet()) {
        result[field.name] = peek(field.name);
      }
      return result;
    },

    prune: () => {
      for (const name of [...values.keys()]) {
        if (!registry.has(name)) values.delete(name);
      }
    },
  });
};

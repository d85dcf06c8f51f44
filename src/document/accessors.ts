/**
 * Accessor surface: the name -> accessor dispatch table of a model.
 *
 * Each declared field gets a reader, a writer and a query. Wrappers
 * registered with `model.wrapAccessor()` are layered on top; each wrapper
 * receives the accessor below it as an explicit `base` function, so wrapping
 * composes instead of replacing.
 *
 * Entries are built lazily and rebuilt when the registry's version changes.
 */

import type { FieldDeclaration } from "../types/field.js";
import type { FieldRegistry } from "../fields/registry.js";
import { isPlainObject } from "../utils/is-plain-object.js";

/** What an accessor needs from a document. */
export interface AccessorTarget {
  readAttribute(name: string): unknown;
  writeAttribute(name: string, value: unknown): void;
}

/**
 * Override layered on a generated accessor.
 *
 * @example
 * ```ts
 * Person.wrapAccessor("name", {
 *   read: (base) => String(base() ?? "").toUpperCase(),
 *   write: (value, base) => base(typeof value === "string" ? value.toLowerCase() : value),
 * });
 * ```
 */
export interface AccessorWrapper {
  readonly read?: ((base: () => unknown, target: AccessorTarget) => unknown) | undefined;
  readonly write?:
    | ((value: unknown, base: (value: unknown) => void, target: AccessorTarget) => void)
    | undefined;
}

/** Generated accessors of one field. */
export interface FieldAccessors {
  readonly name: string;
  readonly read: (target: AccessorTarget) => unknown;
  readonly write: (target: AccessorTarget, value: unknown) => void;
  readonly query: (target: AccessorTarget) => boolean;
}

export interface AccessorTable {
  /** Accessors of a declared field, or undefined if it has none. */
  readonly lookup: (name: string) => FieldAccessors | undefined;
}

/**
 * Presence semantics for query accessors: `null`, `false`, blank strings and
 * empty collections are absent. Boolean fields report only `true`.
 */
export const isPresent = (field: FieldDeclaration, value: unknown): boolean => {
  if (field.type === "boolean") return value === true;
  if (value === null || value === undefined || value === false) return false;
  if (typeof value === "string") return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof Map || value instanceof Set) return value.size > 0;
  if (typeof value === "object" && isPlainObject(value)) {
    return Object.keys(value).length > 0;
  }
  return true;
};

const generateAccessors = (
  field: FieldDeclaration,
  wrappers: readonly AccessorWrapper[],
): FieldAccessors => {
  const { name } = field;
  let read = (target: AccessorTarget): unknown => target.readAttribute(name);
  let write = (target: AccessorTarget, value: unknown): void =>
    target.writeAttribute(name, value);

  for (const wrapper of wrappers) {
    const baseRead = read;
    const baseWrite = write;
    const wrapRead = wrapper.read;
    const wrapWrite = wrapper.write;
    if (wrapRead) {
      read = (target) => wrapRead(() => baseRead(target), target);
    }
    if (wrapWrite) {
      write = (target, value) =>
        wrapWrite(value, (next) => baseWrite(target, next), target);
    }
  }

  return Object.freeze({
    name,
    read,
    write,
    query: (target: AccessorTarget) => isPresent(field, target.readAttribute(name)),
  });
};

/** Creates the dispatch table backed by `registry`. */
export const createAccessorTable = (registry: FieldRegistry): AccessorTable => {
  const entries = new Map<string, FieldAccessors>();
  let builtFor = registry.version();

  return Object.freeze({
    lookup: (name: string) => {
      if (builtFor !== registry.version()) {
        entries.clear();
        builtFor = registry.version();
      }
      const cached = entries.get(name);
      if (cached) return cached;

      const field = registry.find(name);
      if (!field) return undefined;
      const accessors = generateAccessors(field, registry.wrappersOf(name));
      entries.set(name, accessors);
      return accessors;
    },
  });
};

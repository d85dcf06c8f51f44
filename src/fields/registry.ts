/**
 * Per-model field registry.
 *
 * Holds the ordered field declarations of one model plus the accessor
 * wrappers layered on them. Every mutation bumps `version()`, which lets
 * accessor tables built from the registry notice that they are stale.
 *
 * Child models (single-table inheritance) start from `snapshot()` of their
 * parent's registry: later changes to the parent do not reach children that
 * were already defined.
 */

import { warnDeprecatedOnce } from "../config/deprecation.js";
import { type ConfigIssue, ConfigError, UnknownFieldError } from "../errors/errors.js";
import {
  FIELD_TYPES,
  type FieldDeclaration,
  type FieldOptions,
  type FieldType,
} from "../types/field.js";
import type { AccessorWrapper } from "../document/accessors.js";

export interface FieldRegistry {
  /** Name of the model owning this registry, used in error messages. */
  readonly modelName: string;
  /** Schema version token; changes on every declare, undeclare or wrap. */
  readonly version: () => number;
  /** Declares (or redeclares) a field. The last declaration wins. */
  readonly declare: (
    name: string,
    type?: FieldType,
    options?: FieldOptions,
  ) => FieldDeclaration;
  /** Removes a field and its wrappers. Returns false if it was not declared. */
  readonly undeclare: (name: string) => boolean;
  readonly has: (name: string) => boolean;
  /** @throws {UnknownFieldError} */
  readonly get: (name: string) => FieldDeclaration;
  readonly find: (name: string) => FieldDeclaration | undefined;
  /** Declarations in declaration order. */
  readonly fieldSet: () => readonly FieldDeclaration[];
  /** Declaration whose wire attribute name is `storedAs`. */
  readonly findByStoredName: (storedAs: string) => FieldDeclaration | undefined;
  /** Layers an accessor wrapper on a declared field. */
  readonly wrap: (name: string, wrapper: AccessorWrapper) => void;
  /** Wrappers of a field, innermost first. */
  readonly wrappersOf: (name: string) => readonly AccessorWrapper[];
  /** Independent copy for a child model. */
  readonly snapshot: (modelName: string) => FieldRegistry;
}

interface RegistryState {
  readonly declarations: Map<string, FieldDeclaration>;
  readonly wrappers: Map<string, readonly AccessorWrapper[]>;
}

const validateDeclaration = (
  modelName: string,
  name: string,
  type: FieldType,
  options: FieldOptions,
): void => {
  const issues: ConfigIssue[] = [];
  if (name.length === 0) {
    issues.push({ path: "name", message: "Field name must not be empty" });
  }
  if (!FIELD_TYPES.includes(type)) {
    issues.push({ path: "type", message: `Unknown field type "${type}"` });
  }
  if (options.serializer !== undefined && type !== "serialized") {
    issues.push({
      path: "serializer",
      message: "A serializer can only be given to serialized fields",
    });
  }
  if (options.storedAs !== undefined && options.storedAs.length === 0) {
    issues.push({ path: "storedAs", message: "Stored name must not be empty" });
  }
  if (issues.length > 0) {
    throw new ConfigError(`Invalid declaration of ${modelName}.${name}`, issues);
  }
};

const toDeclaration = (
  name: string,
  type: FieldType,
  options: FieldOptions,
): FieldDeclaration =>
  Object.freeze({
    name,
    type,
    hasDefault: options.default !== undefined,
    default: options.default,
    serializer: options.serializer,
    storedAs: options.storedAs ?? name,
    storeAsString: options.storeAsString,
    storeAsNative: options.storeAsNative,
  });

const buildRegistry = (modelName: string, state: RegistryState): FieldRegistry => {
  let version = 0;

  const find = (name: string): FieldDeclaration | undefined =>
    state.declarations.get(name);

  const get = (name: string): FieldDeclaration => {
    const declaration = find(name);
    if (!declaration) throw new UnknownFieldError(modelName, name);
    return declaration;
  };

  return Object.freeze({
    modelName,
    version: () => version,

    declare: (name: string, type: FieldType = "string", options: FieldOptions = {}) => {
      validateDeclaration(modelName, name, type, options);
      const storedAs = options.storedAs ?? name;
      for (const other of state.declarations.values()) {
        if (other.name !== name && other.storedAs === storedAs) {
          throw new ConfigError(
            `Invalid declaration of ${modelName}.${name}`,
            [{ path: "storedAs", message: `"${storedAs}" is already used by field "${other.name}"` }],
          );
        }
      }
      if (type === "float") {
        warnDeprecatedOnce(
          "float-field-type",
          `Field type "float" is deprecated; declare ${modelName}.${name} as "number" instead`,
        );
      }
      const declaration = toDeclaration(name, type, options);
      state.declarations.set(name, declaration);
      version += 1;
      return declaration;
    },

    undeclare: (name: string) => {
      const removed = state.declarations.delete(name);
      state.wrappers.delete(name);
      if (removed) version += 1;
      return removed;
    },

    has: (name: string) => state.declarations.has(name),
    get,
    find,
    fieldSet: () => [...state.declarations.values()],

    findByStoredName: (storedAs: string) => {
      for (const declaration of state.declarations.values()) {
        if (declaration.storedAs === storedAs) return declaration;
      }
      return undefined;
    },

    wrap: (name: string, wrapper: AccessorWrapper) => {
      get(name);
      state.wrappers.set(name, [...(state.wrappers.get(name) ?? []), wrapper]);
      version += 1;
    },

    wrappersOf: (name: string) => state.wrappers.get(name) ?? [],

    snapshot: (childName: string) =>
      buildRegistry(childName, {
        declarations: new Map(state.declarations),
        wrappers: new Map(state.wrappers),
      }),
  });
};

/** Creates an empty field registry for a model. */
export const createFieldRegistry = (modelName: string): FieldRegistry =>
  buildRegistry(modelName, { declarations: new Map(), wrappers: new Map() });

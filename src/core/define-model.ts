/**
 * Factory for model definitions.
 */

import { getConfig } from "../config/config.js";
import { ConfigError } from "../errors/errors.js";
import { type AccessorWrapper, createAccessorTable } from "../document/accessors.js";
import { type Document, createDocument } from "../document/document.js";
import { type FieldRegistry, createFieldRegistry } from "../fields/registry.js";
import { dumpValue } from "../coercion/registry.js";
import type {
  FieldOptions,
  FieldSpecInput,
  FieldSpecs,
  FieldType,
  InferAttributes,
} from "../types/field.js";
import {
  type AttributeInput,
  type AttributeShape,
  type ChildModelConfig,
  type ModelAttributes,
  type ModelConfig,
  type ModelDefinition,
  type Simplify,
  type WriteOptions,
  DEFAULT_HASH_KEY,
} from "../types/model.js";
import {
  attributesForWrite,
  fieldMetadata,
  loadAttributes,
  resolveModelFor,
} from "./wire.js";

interface ModelSpec {
  readonly name: string;
  readonly tableName: string;
  readonly hashKey: string;
  readonly rangeKey: string | undefined;
  readonly inheritanceField: string;
  readonly parent: ModelDefinition | undefined;
  readonly registry: FieldRegistry;
}

/** Child models registered under each ancestor. */
const childrenOf = new WeakMap<ModelDefinition, ModelDefinition[]>();

const declareSpecs = (registry: FieldRegistry, specs: FieldSpecs): void => {
  for (const [name, spec] of Object.entries<FieldSpecInput>(specs)) {
    if (typeof spec === "string") {
      registry.declare(name, spec);
    } else {
      registry.declare(name, spec.type, spec.options);
    }
  }
};

/**
 * A document built from a child model's registry is also a document of each
 * of its ancestors; the child's attribute shape extends theirs.
 */
const asAncestorDocument = <A extends AttributeShape>(doc: Document): Document<A> =>
  doc as Document<A>;

const createModel = <A extends AttributeShape>(spec: ModelSpec): ModelDefinition<A> => {
  const { registry } = spec;
  const accessors = createAccessorTable(registry);

  const keyField = (name: string) => registry.get(name);

  const self: ModelDefinition<A> = Object.freeze({
    name: spec.name,
    tableName: spec.tableName,
    hashKey: spec.hashKey,
    rangeKey: spec.rangeKey,
    inheritanceField: spec.inheritanceField,
    parent: spec.parent,
    fields: registry,
    accessors,

    field: (name: string, type?: FieldType, options?: FieldOptions) =>
      registry.declare(name, type, options),

    removeField: (name: string) => registry.undeclare(name),

    wrapAccessor: (name: string, wrapper: AccessorWrapper) =>
      registry.wrap(name, wrapper),

    schemaVersion: () => registry.version(),

    attributes: () => {
      const result: Record<string, { readonly type: FieldType }> = {};
      for (const field of registry.fieldSet()) {
        result[field.name] = Object.freeze({ type: field.type });
      }
      return Object.freeze(result);
    },

    fieldMetadata: () => fieldMetadata(registry),

    build: (input: AttributeInput<A> = {}) => {
      const values: Record<string, unknown> = Object.fromEntries(Object.entries(input));
      if (registry.has(spec.inheritanceField) && values[spec.inheritanceField] === undefined) {
        values[spec.inheritanceField] = spec.name;
      }
      return createDocument(self, { kind: "new", input: values });
    },

    hydrate: (record: Readonly<Record<string, unknown>>) => {
      const target = resolveModelFor(self, record);
      if (target !== self) return asAncestorDocument<A>(target.hydrate(record));
      return createDocument(self, {
        kind: "persisted",
        values: loadAttributes(registry, record),
      });
    },

    attributesForWrite: (doc: Document<A>, options?: WriteOptions) =>
      attributesForWrite(doc, options),

    keyOf: (doc: Document<A>) => {
      const hashField = keyField(spec.hashKey);
      const key: Record<string, unknown> = {
        [hashField.storedAs]: dumpValue(hashField, doc.readAttribute(spec.hashKey)),
      };
      if (spec.rangeKey !== undefined) {
        const rangeField = keyField(spec.rangeKey);
        key[rangeField.storedAs] = dumpValue(rangeField, doc.readAttribute(spec.rangeKey));
      }
      return key;
    },

    extend: <F extends FieldSpecs>(config: ChildModelConfig<F>) => {
      const childRegistry = registry.snapshot(config.name);
      declareSpecs(childRegistry, config.fields ?? {});
      const child = createModel<Simplify<A & InferAttributes<F>>>({
        ...spec,
        name: config.name,
        parent: self,
        registry: childRegistry,
      });
      for (let ancestor: ModelDefinition | undefined = self; ancestor; ancestor = ancestor.parent) {
        const children = childrenOf.get(ancestor) ?? [];
        children.push(child);
        childrenOf.set(ancestor, children);
      }
      return child;
    },

    descendants: () => [...(childrenOf.get(self) ?? [])],
  });

  return self;
};

/**
 * Defines a model: a typed field set bound to a DynamoDB table.
 *
 * Every model declares its hash key (`id` unless configured) as a string
 * field, followed by the `createdAt` / `updatedAt` datetime fields, followed
 * by the fields given in `fields`.
 *
 * @param config - The model configuration
 * @returns A frozen {@link ModelDefinition}
 *
 * @example
 * ```ts
 * const Address = defineModel({
 *   name: "Address",
 *   tableName: "addresses",
 *   fields: {
 *     city: "string",
 *     deliverable: "boolean",
 *     visits: field("integer", { default: 0 }),
 *   },
 * });
 *
 * const home = Address.build({ city: "Chicago" });
 * home.set("visits", "3");
 * home.get("visits"); // 3
 * ```
 */
export const defineModel = <
  F extends FieldSpecs = Record<never, never>,
  HK extends string = "id",
>(
  config: ModelConfig<F, HK>,
): ModelDefinition<ModelAttributes<F, HK>> => {
  const registry = createFieldRegistry(config.name);
  const hashKey: string = config.hashKey ?? DEFAULT_HASH_KEY;
  const fields: FieldSpecs = config.fields ?? {};

  if (!Object.prototype.hasOwnProperty.call(fields, hashKey)) {
    registry.declare(hashKey, "string");
  }
  registry.declare("createdAt", "datetime");
  registry.declare("updatedAt", "datetime");
  declareSpecs(registry, fields);

  if (config.rangeKey !== undefined && !registry.has(config.rangeKey)) {
    throw new ConfigError(`Invalid model ${config.name}`, [
      { path: "rangeKey", message: `Range key "${config.rangeKey}" is not a declared field` },
    ]);
  }

  return createModel<ModelAttributes<F, HK>>({
    name: config.name,
    tableName: config.tableName ?? `${config.name.toLowerCase()}s`,
    hashKey,
    rangeKey: config.rangeKey,
    inheritanceField: config.inheritanceField ?? getConfig().inheritanceField,
    parent: undefined,
    registry,
  });
};

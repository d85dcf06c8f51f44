/**
 * Model definition types.
 */

import type { AccessorTable, AccessorWrapper } from "../document/accessors.js";
import type { Document } from "../document/document.js";
import type { FieldRegistry } from "../fields/registry.js";
import type {
  FieldDeclaration,
  FieldMetadata,
  FieldOptions,
  FieldSpecs,
  FieldType,
  InferAttributes,
} from "./field.js";

/** Attribute values of a document, keyed by field name. */
export type AttributeShape = Record<string, unknown>;

/** Fields every model declares for creation/update timestamps. */
export interface TimestampAttributes {
  createdAt: Date;
  updatedAt: Date;
}

/** Names of the timestamp fields. */
export const TIMESTAMP_FIELDS: readonly string[] = Object.freeze(["createdAt", "updatedAt"]);

/** Default name of the hash key (identity) field. */
export const DEFAULT_HASH_KEY = "id";

/** Attribute shape of a model defined with fields `F` and hash key `HK`. */
export type ModelAttributes<F extends FieldSpecs, HK extends string> = Simplify<
  { [K in HK]: string } & TimestampAttributes & InferAttributes<F>
>;

/** Flattens an intersection into a single object type. */
export type Simplify<T> = { [K in keyof T]: T[K] } & {};

/** Input accepted when building a document: any subset of its fields. */
export type AttributeInput<A extends AttributeShape> = {
  readonly [K in keyof A & string]?: unknown;
};

/** Configuration input for `defineModel()`. */
export interface ModelConfig<F extends FieldSpecs, HK extends string = "id"> {
  readonly name: string;
  /** Table name without namespace. Default: lower-cased model name plus "s". */
  readonly tableName?: string | undefined;
  /** Identity field. Declared as a string field unless `fields` declares it. Default: `"id"`. */
  readonly hashKey?: HK | undefined;
  /** A field declared in `fields` that completes the item key. */
  readonly rangeKey?: (keyof F & string) | undefined;
  readonly fields?: F | undefined;
  /** Discriminator field for child models. Default: the global `inheritanceField` setting. */
  readonly inheritanceField?: string | undefined;
}

/** Configuration input for `model.extend()`. */
export interface ChildModelConfig<F extends FieldSpecs> {
  readonly name: string;
  readonly fields?: F | undefined;
}

/** Options for `attributesForWrite()`. */
export interface WriteOptions {
  /** Only include fields changed since the last clean point. */
  readonly partial?: boolean | undefined;
}

/**
 * A model: a field registry bound to a table, plus the operations that move
 * documents between the application and DynamoDB items.
 *
 * Methods use shorthand syntax so that `ModelDefinition<Specific>` stays
 * assignable to `ModelDefinition`.
 */
export interface ModelDefinition<A extends AttributeShape = AttributeShape> {
  readonly name: string;
  readonly tableName: string;
  readonly hashKey: string;
  readonly rangeKey: string | undefined;
  readonly inheritanceField: string;
  /** Model this one was extended from, for single-table inheritance. */
  readonly parent: ModelDefinition | undefined;
  readonly fields: FieldRegistry;
  readonly accessors: AccessorTable;

  /** Declares or redeclares a field on this model only. */
  field(name: string, type?: FieldType, options?: FieldOptions): FieldDeclaration;
  /** Removes a field from this model only. */
  removeField(name: string): boolean;
  /** Layers an override on a field's generated accessors. */
  wrapAccessor(name: string, wrapper: AccessorWrapper): void;
  /** Current schema version token of the field registry. */
  schemaVersion(): number;

  /** Field types keyed by name, in field order. */
  attributes(): Readonly<Record<string, { readonly type: FieldType }>>;
  fieldMetadata(): readonly FieldMetadata[];

  /** Builds a new, unsaved document. */
  build(input?: AttributeInput<A>): Document<A>;
  /** Builds a clean, persisted document from a DynamoDB item. */
  hydrate(record: Readonly<Record<string, unknown>>): Document<A>;
  /** Dumped attributes keyed by stored name. */
  attributesForWrite(doc: Document<A>, options?: WriteOptions): Record<string, unknown>;
  /** Dumped key attributes of a document. */
  keyOf(doc: Document<A>): Record<string, unknown>;

  /** Defines a child model sharing this model's table. */
  extend<F extends FieldSpecs>(
    config: ChildModelConfig<F>,
  ): ModelDefinition<Simplify<A & InferAttributes<F>>>;
  /** Child models defined from this one, at any depth. */
  descendants(): readonly ModelDefinition[];
}

/**
 * Field declaration types.
 *
 * A field pairs a name with a type tag; the tag selects the coercion rules
 * used when values move between documents and DynamoDB items.
 */

/**
 * Type tags a field can be declared with.
 *
 * `"float"` is a deprecated alias of `"number"`.
 */
export type FieldType =
  | "string"
  | "integer"
  | "number"
  | "float"
  | "boolean"
  | "datetime"
  | "date"
  | "serialized"
  | "raw";

/** Every supported type tag, in declaration order. */
export const FIELD_TYPES: readonly FieldType[] = Object.freeze([
  "string",
  "integer",
  "number",
  "float",
  "boolean",
  "datetime",
  "date",
  "serialized",
  "raw",
]);

/** Domain (application-side) value type for each tag. */
export interface FieldValueMap {
  string: string;
  integer: number;
  number: number;
  float: number;
  boolean: boolean;
  datetime: Date;
  date: Date;
  serialized: unknown;
  raw: unknown;
}

/**
 * A bidirectional converter supplied for a `serialized` field.
 *
 * Method shorthand keeps `Serializer<Date>` assignable to
 * `Serializer<unknown>` under `--strictFunctionTypes`.
 */
export interface Serializer<T = unknown> {
  dump(value: T): unknown;
  load(wire: unknown): T;
}

/** A static default or a zero-argument producer. */
export type DefaultValue<T> = T | (() => T);

/** Options accepted when declaring a field. */
export interface FieldOptions<V = unknown> {
  /**
   * Value used when a document is built without one. Producers run once per
   * document; static objects are shared by reference.
   */
  readonly default?: DefaultValue<V | null> | undefined;
  /** Custom dump/load pair; only valid on `serialized` fields. */
  readonly serializer?: Serializer<V> | undefined;
  /** Attribute name used in DynamoDB items, when it differs from the field name. */
  readonly storedAs?: string | undefined;
  /** `datetime` / `date`: store ISO text. Falls back to the global setting. */
  readonly storeAsString?: boolean | undefined;
  /** `boolean`: store native BOOL values. Falls back to the global setting. */
  readonly storeAsNative?: boolean | undefined;
}

/** A declared field, as held by a field registry. */
export interface FieldDeclaration {
  readonly name: string;
  readonly type: FieldType;
  readonly hasDefault: boolean;
  readonly default: DefaultValue<unknown> | undefined;
  readonly serializer: Serializer | undefined;
  /** Attribute name in DynamoDB items. */
  readonly storedAs: string;
  readonly storeAsString: boolean | undefined;
  readonly storeAsNative: boolean | undefined;
}

/** Introspection view of a field, for query planners and schema tooling. */
export interface FieldMetadata {
  readonly name: string;
  readonly type: FieldType;
  readonly hasDefault: boolean;
  readonly storedAs: string;
}

/**
 * A field spec used inside `defineModel({ fields })`, produced by `field()`.
 * `V` is the domain type of the field's values.
 */
export interface FieldSpec<T extends FieldType = FieldType, V = FieldValueMap[T]> {
  readonly type: T;
  readonly options: FieldOptions<V>;
}

/** A field spec, or a bare type tag as shorthand. */
export type FieldSpecInput = FieldType | FieldSpec<FieldType, unknown>;

/** Field specs keyed by field name. */
export type FieldSpecs = Readonly<Record<string, FieldSpecInput>>;

/** Domain value type of a single field spec. */
export type FieldSpecValue<S> = S extends FieldType
  ? FieldValueMap[S]
  : S extends FieldSpec<infer _T, infer V>
    ? V
    : never;

/** Infers a document's attribute shape from its field specs. */
export type InferAttributes<F extends FieldSpecs> = {
  [K in keyof F & string]: FieldSpecValue<F[K]>;
};

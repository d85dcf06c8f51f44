/**
 * Documents: one instance of a model, with its attribute values and
 * dirty-tracking state.
 */

import { UnknownFieldError } from "../errors/errors.js";
import type {
  AttributeInput,
  AttributeShape,
  ModelDefinition,
} from "../types/model.js";
import type { AccessorTarget, FieldAccessors } from "./accessors.js";
import { createAttributeStore } from "./attribute-store.js";
import { type AttributeChange, createDirtyLedger } from "./dirty-ledger.js";

/** Attribute values of a document as a plain record. */
export type AttributeValues<A extends AttributeShape> = {
  readonly [K in keyof A]: A[K] | null;
};

/**
 * A model instance.
 *
 * `get` / `set` are the named accessors and go through any wrapper layered
 * with `model.wrapAccessor()`. `readAttribute` / `writeAttribute` are the
 * indexable accessors: they reach the attribute store directly.
 */
export interface Document<A extends AttributeShape = AttributeShape> extends AccessorTarget {
  readonly model: ModelDefinition<A>;

  get<K extends keyof A & string>(name: K): A[K] | null;
  set<K extends keyof A & string>(name: K, value: unknown): void;
  /** Assigns several fields through their named writers. */
  assign(input: AttributeInput<A>): void;
  /** Query accessor: whether the field holds a present value. */
  is(name: keyof A & string): boolean;

  /** Value of the field at the last clean point. */
  was<K extends keyof A & string>(name: K): A[K] | null;
  isChanged(name: keyof A & string): boolean;
  changedFields(): ReadonlySet<string>;
  changeFor(name: keyof A & string): AttributeChange | undefined;
  /** Before/after pairs of every changed field. */
  changes(): Readonly<Record<string, AttributeChange>>;

  /** Whether accessors currently exist for `name`. */
  respondsTo(name: string): boolean;
  toAttributes(): AttributeValues<A>;

  /** True until the document has been saved or was loaded from the store. */
  isNewRecord(): boolean;
  /** Establishes a clean point after a successful write. */
  markSynchronized(): void;
  /** Replaces every value with already-loaded ones and establishes a clean point. */
  restore(values: Readonly<Record<string, unknown>>): void;
}

/** How a document starts its life. */
export type DocumentInit =
  | { readonly kind: "new"; readonly input: Readonly<Record<string, unknown>> }
  | { readonly kind: "persisted"; readonly values: Readonly<Record<string, unknown>> };

/**
 * Narrows a stored value to the attribute type the model declares. The
 * coercion registry is what guarantees the runtime type.
 */
const asAttribute = <A extends AttributeShape, K extends keyof A>(value: unknown) =>
  value as A[K] | null;

const asAttributeValues = <A extends AttributeShape>(values: unknown) =>
  values as AttributeValues<A>;

/** Creates a document for `model`. Use `model.build()` or `model.hydrate()`. */
export const createDocument = <A extends AttributeShape>(
  model: ModelDefinition<A>,
  init: DocumentInit,
): Document<A> => {
  const registry = model.fields;
  const store = createAttributeStore(registry);
  const ledger = createDirtyLedger(store.peek, registry.has);
  let persisted = false;

  const accessorsFor = (name: string): FieldAccessors => {
    const accessors = model.accessors.lookup(name);
    if (!accessors) throw new UnknownFieldError(registry.modelName, name);
    return accessors;
  };

  const readAttribute = (name: string): unknown => store.get(name);

  const writeAttribute = (name: string, value: unknown): void => {
    const before = store.get(name);
    store.set(name, value);
    ledger.record(name, before);
  };

  const restore = (values: Readonly<Record<string, unknown>>): void => {
    for (const field of registry.fieldSet()) {
      store.put(field.name, values[field.name] ?? null);
    }
    store.prune();
    ledger.markAllClean();
    persisted = true;
  };

  const changeFor = (name: string): AttributeChange | undefined => {
    registry.get(name);
    return ledger.changeFor(name);
  };

  const doc: Document<A> = Object.freeze({
    model,
    readAttribute,
    writeAttribute,

    get: <K extends keyof A & string>(name: K) =>
      asAttribute<A, K>(accessorsFor(name).read(doc)),

    set: <K extends keyof A & string>(name: K, value: unknown) => {
      accessorsFor(name).write(doc, value);
    },

    assign: (input: AttributeInput<A>) => {
      for (const [name, value] of Object.entries(input)) {
        if (value !== undefined) accessorsFor(name).write(doc, value);
      }
    },

    is: (name: keyof A & string) => accessorsFor(name).query(doc),

    was: <K extends keyof A & string>(name: K) => {
      registry.get(name);
      return asAttribute<A, K>(ledger.wasValue(name));
    },

    isChanged: (name: keyof A & string) => changeFor(name) !== undefined,
    changedFields: () => ledger.changedFields(),
    changeFor,

    changes: () => {
      const result: Record<string, AttributeChange> = {};
      for (const name of ledger.changedFields()) {
        const change = ledger.changeFor(name);
        if (change) result[name] = change;
      }
      return result;
    },

    respondsTo: (name: string) => model.accessors.lookup(name) !== undefined,

    toAttributes: () => asAttributeValues<A>(store.snapshot()),

    isNewRecord: () => !persisted,

    markSynchronized: () => {
      for (const field of registry.fieldSet()) {
        ledger.markClean(field.name, store.peek(field.name));
      }
      persisted = true;
    },

    restore,
  });

  if (init.kind === "persisted") {
    restore(init.values);
  } else {
    for (const name of store.seed(init.input)) {
      ledger.record(name, null);
    }
  }

  return doc;
};

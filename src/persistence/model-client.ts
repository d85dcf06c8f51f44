/**
 * Persistence bridge: moves documents of one model to and from DynamoDB
 * through an {@link SDKAdapter}.
 *
 * Store failures come back as `Result` errors. Attribute errors (unknown
 * fields, failed casts, custom serializer errors) are not store failures and
 * reject the returned promise.
 */

import { v4 as uuidv4 } from "uuid";
import type { SDKAdapter, WireItem } from "../adapters/adapter.js";
import { castValue, dumpValue } from "../coercion/registry.js";
import { getConfig } from "../config/config.js";
import { loadAttributes } from "../core/wire.js";
import type { Document } from "../document/document.js";
import { marshallItem } from "../marshalling/marshall.js";
import type { AttributeMap } from "../marshalling/types.js";
import { unmarshallItem } from "../marshalling/unmarshall.js";
import { type Result, ok, err } from "../types/common.js";
import type {
  AttributeInput,
  AttributeShape,
  ModelDefinition,
} from "../types/model.js";
import { type DynamoError, createDynamoError } from "../types/operations.js";
import {
  attributeExists,
  attributeNotExists,
  compileUpdate,
} from "./expressions.js";

/** Key field values of an item, keyed by field name. */
export type KeyInput = Readonly<Record<string, unknown>>;

/** Options for `find()`. */
export interface FindOptions {
  readonly consistentRead?: boolean | undefined;
}

/** Document operations for one model. */
export interface ModelClient<A extends AttributeShape> {
  readonly model: ModelDefinition<A>;
  /** Builds a new, unsaved document. */
  readonly build: (input?: AttributeInput<A>) => Document<A>;
  /** Builds and saves a document. */
  readonly create: (input?: AttributeInput<A>) => Promise<Result<Document<A>, DynamoError>>;
  /**
   * Writes a document: a guarded full put for new documents, an update of the
   * changed attributes otherwise. Saving an unchanged persisted document does
   * not reach the store.
   */
  readonly save: (doc: Document<A>) => Promise<Result<Document<A>, DynamoError>>;
  /** Loads a document by key; `undefined` when no item exists. */
  readonly find: (
    key: KeyInput,
    options?: FindOptions,
  ) => Promise<Result<Document<A> | undefined, DynamoError>>;
  /** Replaces a document's values with the stored ones. */
  readonly reload: (doc: Document<A>) => Promise<Result<Document<A>, DynamoError>>;
  /** Sets one field through its named writer and saves. */
  readonly updateAttribute: <K extends keyof A & string>(
    doc: Document<A>,
    name: K,
    value: unknown,
  ) => Promise<Result<Document<A>, DynamoError>>;
  /** Assigns several fields through their named writers and saves. */
  readonly updateAttributes: (
    doc: Document<A>,
    input: AttributeInput<A>,
  ) => Promise<Result<Document<A>, DynamoError>>;
  /** Deletes the document's item. */
  readonly delete: (doc: Document<A>) => Promise<Result<void, DynamoError>>;
}

const tableNameOf = (model: ModelDefinition): string =>
  `${getConfig().namespace}${model.tableName}`;

const keyFieldsOf = (model: ModelDefinition): readonly string[] =>
  model.rangeKey === undefined ? [model.hashKey] : [model.hashKey, model.rangeKey];

const withoutNulls = (record: Readonly<Record<string, unknown>>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(record).filter(([, value]) => value !== null));

const buildKey = (model: ModelDefinition, input: KeyInput): Result<Record<string, unknown>, DynamoError> => {
  const key: Record<string, unknown> = {};
  for (const name of keyFieldsOf(model)) {
    const field = model.fields.get(name);
    const wire = dumpValue(field, castValue(field, input[name]));
    if (wire === null) {
      return err(createDynamoError("validation", `Missing key attribute "${name}" for ${model.name}`));
    }
    key[field.storedAs] = wire;
  }
  return ok(key);
};

/**
 * Creates the document operations for `model`.
 *
 * @param model - The model whose documents are stored
 * @param adapter - The SDK adapter used for every call
 */
export const createModelClient = <A extends AttributeShape>(
  model: ModelDefinition<A>,
  adapter: SDKAdapter,
): ModelClient<A> => {
  const log = () => getConfig().logger;

  const toWire = (record: Readonly<Record<string, unknown>>): Result<WireItem, DynamoError> => {
    if (!adapter.isRaw) return ok(record);
    const marshalled = marshallItem(record);
    return marshalled.success
      ? marshalled
      : err(createDynamoError("marshalling", marshalled.error.message, marshalled.error));
  };

  const fromWire = (item: WireItem): Result<Record<string, unknown>, DynamoError> => {
    if (!adapter.isRaw) return ok(item);
    const unmarshalled = unmarshallItem(item as AttributeMap);
    return unmarshalled.success
      ? unmarshalled
      : err(createDynamoError("marshalling", unmarshalled.error.message, unmarshalled.error));
  };

  const call = async <T>(operation: string, send: () => Promise<T>): Promise<Result<T, DynamoError>> => {
    try {
      return ok(await send());
    } catch (cause) {
      log().debug(`${operation} failed`, { model: model.name, cause });
      return err(
        createDynamoError(
          "dynamo",
          cause instanceof Error ? cause.message : `${operation} failed`,
          cause,
        ),
      );
    }
  };

  const getRecord = async (
    target: ModelDefinition,
    key: Record<string, unknown>,
    consistentRead: boolean | undefined,
  ): Promise<Result<Record<string, unknown> | undefined, DynamoError>> => {
    const wireKey = toWire(key);
    if (!wireKey.success) return wireKey;

    const tableName = tableNameOf(target);
    log().debug("GetItem", { model: target.name, tableName, key });
    const result = await call("GetItem", () =>
      adapter.getItem({ tableName, key: wireKey.data, consistentRead }),
    );
    if (!result.success) return result;
    if (!result.data.item) return ok(undefined);
    return fromWire(result.data.item);
  };

  /**
   * Fills identity, discriminator and timestamps before a write. The value
   * each stamped field held before is recorded in `stamped`.
   */
  const prepare = (doc: Document<A>, stamped: Map<string, unknown>): Result<void, DynamoError> => {
    const target = doc.model;
    const stamp = (name: string, value: unknown): void => {
      if (!stamped.has(name)) stamped.set(name, doc.readAttribute(name));
      doc.writeAttribute(name, value);
    };
    const hashField = target.fields.get(target.hashKey);
    if (doc.readAttribute(target.hashKey) === null) {
      if (hashField.type !== "string") {
        return err(
          createDynamoError("validation", `Missing hash key "${target.hashKey}" for ${target.name}`),
        );
      }
      stamp(target.hashKey, uuidv4());
    }
    if (target.rangeKey !== undefined && doc.readAttribute(target.rangeKey) === null) {
      return err(
        createDynamoError("validation", `Missing range key "${target.rangeKey}" for ${target.name}`),
      );
    }
    if (
      target.fields.has(target.inheritanceField) &&
      doc.readAttribute(target.inheritanceField) === null
    ) {
      stamp(target.inheritanceField, target.name);
    }
    if (getConfig().timestamps) {
      const now = new Date();
      if (doc.isNewRecord() && doc.readAttribute("createdAt") === null) {
        stamp("createdAt", now);
      }
      if (!doc.changedFields().has("updatedAt")) {
        stamp("updatedAt", now);
      }
    }
    return ok(undefined);
  };

  const insert = async (doc: Document<A>): Promise<Result<Document<A>, DynamoError>> => {
    const target = doc.model;
    const item = toWire(withoutNulls(target.attributesForWrite(doc)));
    if (!item.success) return item;

    const tableName = tableNameOf(target);
    const condition = attributeNotExists(target.fields.get(target.hashKey).storedAs);
    log().debug("PutItem", { model: target.name, tableName, key: target.keyOf(doc) });
    const result = await call("PutItem", () =>
      adapter.putItem({
        tableName,
        item: item.data,
        conditionExpression: condition.expression,
        expressionAttributeNames: condition.expressionAttributeNames,
      }),
    );
    if (!result.success) return result;
    doc.markSynchronized();
    return ok(doc);
  };

  const update = async (doc: Document<A>): Promise<Result<Document<A>, DynamoError>> => {
    const target = doc.model;
    const changedKeys = keyFieldsOf(target).filter((name) => doc.changedFields().has(name));
    if (changedKeys.length > 0) {
      return err(
        createDynamoError(
          "validation",
          `Key attributes of a stored ${target.name} cannot change: ${changedKeys.join(", ")}`,
        ),
      );
    }

    const key = target.keyOf(doc);
    const sets: Record<string, unknown> = {};
    const removes: string[] = [];
    for (const [storedAs, value] of Object.entries(target.attributesForWrite(doc, { partial: true }))) {
      if (storedAs in key) continue;
      if (value === null) removes.push(storedAs);
      else sets[storedAs] = value;
    }

    const compiled = compileUpdate({ sets, removes });
    if (!compiled) {
      doc.markSynchronized();
      return ok(doc);
    }

    const wireKey = toWire(key);
    if (!wireKey.success) return wireKey;
    const wireValues = toWire(compiled.expressionAttributeValues);
    if (!wireValues.success) return wireValues;

    const hashStoredAs = target.fields.get(target.hashKey).storedAs;
    const condition = attributeExists(hashStoredAs);
    const tableName = tableNameOf(target);
    log().debug("UpdateItem", { model: target.name, tableName, key, update: compiled.expression });
    const result = await call("UpdateItem", () =>
      adapter.updateItem({
        tableName,
        key: wireKey.data,
        updateExpression: compiled.expression,
        conditionExpression: condition.expression,
        expressionAttributeNames: {
          ...compiled.expressionAttributeNames,
          ...condition.expressionAttributeNames,
        },
        expressionAttributeValues:
          Object.keys(compiled.expressionAttributeValues).length > 0 ? wireValues.data : undefined,
      }),
    );
    if (!result.success) return result;
    doc.markSynchronized();
    return ok(doc);
  };

  /**
   * A failed save leaves the document as it was before the call: fields
   * stamped by `prepare` get their earlier values back, so a retry stamps
   * them afresh.
   */
  const save = async (doc: Document<A>): Promise<Result<Document<A>, DynamoError>> => {
    if (!doc.isNewRecord() && doc.changedFields().size === 0) return ok(doc);
    const stamped = new Map<string, unknown>();
    const rollback = (): void => {
      for (const [name, value] of stamped) doc.writeAttribute(name, value);
    };

    try {
      const prepared = prepare(doc, stamped);
      const result: Result<Document<A>, DynamoError> = prepared.success
        ? await (doc.isNewRecord() ? insert(doc) : update(doc))
        : prepared;
      if (!result.success) rollback();
      return result;
    } catch (error) {
      rollback();
      throw error;
    }
  };

  return Object.freeze({
    model,

    build: (input?: AttributeInput<A>) => model.build(input),

    create: (input?: AttributeInput<A>) => save(model.build(input)),

    save,

    find: async (keyInput: KeyInput, options?: FindOptions) => {
      const key = buildKey(model, keyInput);
      if (!key.success) return key;
      const record = await getRecord(model, key.data, options?.consistentRead);
      if (!record.success) return record;
      return ok(record.data === undefined ? undefined : model.hydrate(record.data));
    },

    reload: async (doc: Document<A>) => {
      const target = doc.model;
      const record = await getRecord(target, target.keyOf(doc), true);
      if (!record.success) return record;
      if (record.data === undefined) {
        return err(createDynamoError("not-found", `${target.name} no longer exists`));
      }
      doc.restore(loadAttributes(target.fields, record.data));
      return ok(doc);
    },

    updateAttribute: <K extends keyof A & string>(doc: Document<A>, name: K, value: unknown) => {
      doc.set(name, value);
      return save(doc);
    },

    updateAttributes: (doc: Document<A>, input: AttributeInput<A>) => {
      doc.assign(input);
      return save(doc);
    },

    delete: async (doc: Document<A>) => {
      const target = doc.model;
      const key = target.keyOf(doc);
      const wireKey = toWire(key);
      if (!wireKey.success) return wireKey;
      const tableName = tableNameOf(target);
      log().debug("DeleteItem", { model: target.name, tableName, key });
      const result = await call("DeleteItem", () =>
        adapter.deleteItem({ tableName, key: wireKey.data }),
      );
      return result.success ? ok(undefined) : result;
    },
  });
};

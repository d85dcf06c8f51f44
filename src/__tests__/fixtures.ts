/**
 * Shared test fixtures used across all test files.
 */

import { vi } from "vitest";
import type {
  DeleteItemInput,
  GetItemInput,
  PutItemInput,
  SDKAdapter,
  UpdateItemInput,
  WireItem,
} from "../adapters/adapter.js";
import { type Logger } from "../config/logger.js";
import { createFieldRegistry } from "../fields/registry.js";
import type { FieldDeclaration, FieldOptions, FieldType } from "../types/field.js";

// ---------------------------------------------------------------------------
// Field declarations
// ---------------------------------------------------------------------------

/** Declares a single field on a throwaway registry. */
export const declareField = (
  type: FieldType,
  options: FieldOptions = {},
  name = "value",
): FieldDeclaration => createFieldRegistry("Sample").declare(name, type, options);

// ---------------------------------------------------------------------------
// Logger spy
// ---------------------------------------------------------------------------

export const createSpyLogger = () => ({
  debug: vi.fn<Logger["debug"]>(),
  info: vi.fn<Logger["info"]>(),
  warn: vi.fn<Logger["warn"]>(),
  error: vi.fn<Logger["error"]>(),
});

// ---------------------------------------------------------------------------
// Mock adapter factory
// ---------------------------------------------------------------------------

export const createMockAdapter = () => ({
  isRaw: false,
  putItem: vi.fn<SDKAdapter["putItem"]>().mockResolvedValue(undefined),
  getItem: vi.fn<SDKAdapter["getItem"]>().mockResolvedValue({ item: undefined }),
  updateItem: vi.fn<SDKAdapter["updateItem"]>().mockResolvedValue(undefined),
  deleteItem: vi.fn<SDKAdapter["deleteItem"]>().mockResolvedValue(undefined),
});

// ---------------------------------------------------------------------------
// In-memory adapter
// ---------------------------------------------------------------------------

export class ConditionalCheckFailedException extends Error {
  constructor() {
    super("The conditional request failed");
    this.name = "ConditionalCheckFailedException";
  }
}

type StoredItem = Record<string, unknown>;

/**
 * Adapter backed by Maps, one per table. Understands the condition and update
 * expressions the persistence bridge issues. Every method is a `vi.fn` so
 * calls can be inspected.
 */
export const createMemoryAdapter = (
  options: { readonly isRaw?: boolean; readonly keys?: readonly string[] } = {},
) => {
  const keys = options.keys ?? ["id"];
  const tables = new Map<string, Map<string, StoredItem>>();

  const tableOf = (name: string): Map<string, StoredItem> => {
    const existing = tables.get(name);
    if (existing) return existing;
    const created = new Map<string, StoredItem>();
    tables.set(name, created);
    return created;
  };

  const keyString = (key: WireItem): string => JSON.stringify(keys.map((k) => key[k]));

  const checkCondition = (
    input: { readonly conditionExpression?: string | undefined },
    exists: boolean,
  ): void => {
    if (input.conditionExpression === "attribute_not_exists(#key)" && exists) {
      throw new ConditionalCheckFailedException();
    }
    if (input.conditionExpression === "attribute_exists(#key)" && !exists) {
      throw new ConditionalCheckFailedException();
    }
  };

  const applyUpdate = (item: StoredItem, input: UpdateItemInput): void => {
    const names = input.expressionAttributeNames ?? {};
    const values: WireItem = input.expressionAttributeValues ?? {};
    // "SET #n0 = :v0, #n1 = :v1 REMOVE #n2"; a REMOVE-only expression splits to ["", ...].
    const [setClause = "", removeClause = ""] = input.updateExpression
      .split(/\s*REMOVE\s+/)
      .map((part) => part.replace(/^SET\s+/, ""));

    for (const assignment of setClause.split(/,\s*/).filter(Boolean)) {
      const [alias = "", placeholder = ""] = assignment.split(/\s*=\s*/);
      item[names[alias] ?? alias] = values[placeholder];
    }
    for (const alias of removeClause.split(/,\s*/).filter(Boolean)) {
      delete item[names[alias] ?? alias];
    }
  };

  const adapter = {
    isRaw: options.isRaw ?? false,

    putItem: vi.fn(async (input: PutItemInput): Promise<void> => {
      const table = tableOf(input.tableName);
      const id = keyString(input.item);
      checkCondition(input, table.has(id));
      table.set(id, { ...input.item });
    }),

    getItem: vi.fn(async (input: GetItemInput) => {
      const item = tableOf(input.tableName).get(keyString(input.key));
      return { item: item ? { ...item } : undefined };
    }),

    updateItem: vi.fn(async (input: UpdateItemInput): Promise<void> => {
      const table = tableOf(input.tableName);
      const id = keyString(input.key);
      const existing = table.get(id);
      checkCondition(input, existing !== undefined);
      const item: StoredItem = { ...input.key, ...existing };
      applyUpdate(item, input);
      table.set(id, item);
    }),

    deleteItem: vi.fn(async (input: DeleteItemInput): Promise<void> => {
      tableOf(input.tableName).delete(keyString(input.key));
    }),

    /** Items currently stored in a table. */
    itemsOf: (tableName: string): StoredItem[] => [...tableOf(tableName).values()],

    /** Stores an item directly, bypassing conditions. */
    seedItem: (tableName: string, item: StoredItem): void => {
      tableOf(tableName).set(keyString(item), { ...item });
    },
  };

  return adapter;
};

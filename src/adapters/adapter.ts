/**
 * Store transport interface.
 *
 * The persistence layer reaches DynamoDB only through this record of async
 * functions. Each adapter wraps one SDK flavour; tests supply an in-memory one.
 */

import type { AttributeMap } from "../marshalling/types.js";

/** An item or key in either AttributeValue or DocumentClient form. */
export type WireItem = AttributeMap | Record<string, unknown>;

interface TableInput {
  readonly tableName: string;
}

interface ExpressionInput {
  readonly conditionExpression?: string | undefined;
  readonly expressionAttributeNames?: Record<string, string> | undefined;
  readonly expressionAttributeValues?: WireItem | undefined;
}

/** Input for PutItem. */
export interface PutItemInput extends TableInput, ExpressionInput {
  readonly item: WireItem;
}

/** Input for GetItem. */
export interface GetItemInput extends TableInput {
  readonly key: WireItem;
  readonly consistentRead?: boolean | undefined;
}

/** Output for GetItem. */
export interface GetItemOutput {
  readonly item?: WireItem | undefined;
}

/** Input for UpdateItem. */
export interface UpdateItemInput extends TableInput, ExpressionInput {
  readonly key: WireItem;
  readonly updateExpression: string;
}

/** Input for DeleteItem. */
export interface DeleteItemInput extends TableInput, ExpressionInput {
  readonly key: WireItem;
}

/**
 * Item operations the persistence bridge issues. Writes resolve with nothing:
 * a successful write makes the document's current values its clean values.
 *
 * Failures, including DynamoDB's item-size limit, are reported by rejecting.
 */
export interface SDKAdapter {
  /** True when items travel as AttributeValue maps and must be marshalled. */
  readonly isRaw: boolean;

  readonly putItem: (input: PutItemInput) => Promise<void>;
  readonly getItem: (input: GetItemInput) => Promise<GetItemOutput>;
  readonly updateItem: (input: UpdateItemInput) => Promise<void>;
  readonly deleteItem: (input: DeleteItemInput) => Promise<void>;
}

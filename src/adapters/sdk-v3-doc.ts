/**
 * Transport over `DynamoDBDocumentClient` from `@aws-sdk/lib-dynamodb`. Dumped
 * values go out as they are; the document client does the AttributeValue
 * conversion.
 */

import type {
  DeleteItemInput,
  GetItemInput,
  PutItemInput,
  SDKAdapter,
  UpdateItemInput,
} from "./adapter.js";

/** The one client method the adapter calls. */
interface DynamoDBDocumentClientV3 {
  send(command: unknown): Promise<unknown>;
}

/** Any of `PutCommand`, `GetCommand`, `UpdateCommand` or `DeleteCommand`. */
interface CommandConstructor {
  new (input: unknown): unknown;
}

/**
 * Creates a document-client transport. With `isRaw` false, model clients
 * skip their own marshalling and hand over keys and items as dumped.
 *
 * @example
 * ```ts
 * import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
 * import {
 *   DynamoDBDocumentClient, PutCommand, GetCommand, UpdateCommand, DeleteCommand,
 * } from "@aws-sdk/lib-dynamodb";
 *
 * const documentClient = DynamoDBDocumentClient.from(new DynamoDBClient({}));
 * const adapter = createSDKv3DocAdapter(documentClient, {
 *   PutCommand, GetCommand, UpdateCommand, DeleteCommand,
 * });
 * ```
 */
export const createSDKv3DocAdapter = (
  client: DynamoDBDocumentClientV3,
  commands: {
    readonly PutCommand: CommandConstructor;
    readonly GetCommand: CommandConstructor;
    readonly UpdateCommand: CommandConstructor;
    readonly DeleteCommand: CommandConstructor;
  },
): SDKAdapter =>
  Object.freeze({
    isRaw: false,

    putItem: async (input: PutItemInput) => {
      await client.send(
        new commands.PutCommand({
          TableName: input.tableName,
          Item: input.item,
          ConditionExpression: input.conditionExpression,
          ExpressionAttributeNames: input.expressionAttributeNames,
          ExpressionAttributeValues: input.expressionAttributeValues,
        }),
      );
    },

    getItem: async (input: GetItemInput) => {
      const result = (await client.send(
        new commands.GetCommand({
          TableName: input.tableName,
          Key: input.key,
          ConsistentRead: input.consistentRead,
        }),
      )) as { Item?: Record<string, unknown> };
      return { item: result.Item };
    },

    updateItem: async (input: UpdateItemInput) => {
      await client.send(
        new commands.UpdateCommand({
          TableName: input.tableName,
          Key: input.key,
          UpdateExpression: input.updateExpression,
          ConditionExpression: input.conditionExpression,
          ExpressionAttributeNames: input.expressionAttributeNames,
          ExpressionAttributeValues: input.expressionAttributeValues,
        }),
      );
    },

    deleteItem: async (input: DeleteItemInput) => {
      await client.send(
        new commands.DeleteCommand({
          TableName: input.tableName,
          Key: input.key,
          ConditionExpression: input.conditionExpression,
          ExpressionAttributeNames: input.expressionAttributeNames,
          ExpressionAttributeValues: input.expressionAttributeValues,
        }),
      );
    },
  });

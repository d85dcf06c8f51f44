/**
 * Transport over `DynamoDBClient` from `@aws-sdk/client-dynamodb`.
 *
 * Items and keys arrive already marshalled to AttributeValue maps; model
 * clients do that whenever `isRaw` is set.
 */

import type {
  DeleteItemInput,
  GetItemInput,
  PutItemInput,
  SDKAdapter,
  UpdateItemInput,
} from "./adapter.js";
import type { AttributeMap } from "../marshalling/types.js";

/** The one client method the adapter calls. */
interface DynamoDBClientV3 {
  send(command: unknown): Promise<unknown>;
}

/** Any of the four item command classes. */
interface CommandConstructor {
  new (input: unknown): unknown;
}

/**
 * Creates a raw transport. Command classes are passed in so the SDK stays an
 * optional peer.
 *
 * @example
 * ```ts
 * import {
 *   DynamoDBClient, PutItemCommand, GetItemCommand, UpdateItemCommand, DeleteItemCommand,
 * } from "@aws-sdk/client-dynamodb";
 *
 * const adapter = createSDKv3Adapter(new DynamoDBClient({}), {
 *   PutItemCommand, GetItemCommand, UpdateItemCommand, DeleteItemCommand,
 * });
 * ```
 */
export const createSDKv3Adapter = (
  client: DynamoDBClientV3,
  commands: {
    readonly PutItemCommand: CommandConstructor;
    readonly GetItemCommand: CommandConstructor;
    readonly UpdateItemCommand: CommandConstructor;
    readonly DeleteItemCommand: CommandConstructor;
  },
): SDKAdapter =>
  Object.freeze({
    isRaw: true,

    putItem: async (input: PutItemInput) => {
      await client.send(
        new commands.PutItemCommand({
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
        new commands.GetItemCommand({
          TableName: input.tableName,
          Key: input.key,
          ConsistentRead: input.consistentRead,
        }),
      )) as { Item?: AttributeMap };
      return { item: result.Item };
    },

    updateItem: async (input: UpdateItemInput) => {
      await client.send(
        new commands.UpdateItemCommand({
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
        new commands.DeleteItemCommand({
          TableName: input.tableName,
          Key: input.key,
          ConditionExpression: input.conditionExpression,
          ExpressionAttributeNames: input.expressionAttributeNames,
          ExpressionAttributeValues: input.expressionAttributeValues,
        }),
      );
    },
  });

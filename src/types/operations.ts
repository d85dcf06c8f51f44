/**
 * Error type returned by persistence operations.
 */

/** Error type for DynamoDB operations. */
export interface DynamoError {
  /**
   * - `dynamo`: the store rejected the request (conditions, item size, throttling)
   * - `marshalling`: an item could not be converted to or from AttributeValues
   * - `not-found`: the requested item does not exist
   * - `validation`: the document cannot be written as it is (e.g. a missing key)
   */
  readonly type: "dynamo" | "marshalling" | "not-found" | "validation";
  readonly message: string;
  readonly cause?: unknown;
}

/** Creates a DynamoError. */
export const createDynamoError = (
  type: DynamoError["type"],
  message: string,
  cause?: unknown,
): DynamoError =>
  Object.freeze({ type, message, cause });

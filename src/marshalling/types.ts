/**
 * DynamoDB AttributeValue types for self-contained marshalling.
 *
 * These mirror the AWS SDK types but are defined locally so that raw
 * adapters work without a runtime dependency on the SDK's util package.
 */

/** A DynamoDB AttributeValue. */
export type AttributeValue =
  | { readonly S: string }
  | { readonly N: string }
  | { readonly B: Uint8Array }
  | { readonly SS: readonly string[] }
  | { readonly NS: readonly string[] }
  | { readonly BS: readonly Uint8Array[] }
  | { readonly L: readonly AttributeValue[] }
  | { readonly M: Readonly<Record<string, AttributeValue>> }
  | { readonly NULL: true }
  | { readonly BOOL: boolean };

/** A DynamoDB item: a record of attribute name to AttributeValue. */
export type AttributeMap = Readonly<Record<string, AttributeValue>>;

/** Raised (inside a Result) when a value has no AttributeValue form. */
export class MarshallingError extends Error {
  constructor(
    /** Attribute path of the offending value, e.g. `tags[2].name`. */
    readonly path: string,
    message: string,
  ) {
    super(`${path}: ${message}`);
    this.name = "MarshallingError";
  }
}

/** Joins a parent path and a map key or list index. */
export const childPath = (parent: string, key: string | number): string =>
  typeof key === "number" ? `${parent}[${key}]` : parent === "" ? key : `${parent}.${key}`;

/**
 * Marshalls dumped attribute values into DynamoDB AttributeValue format.
 */

import { type Result, ok, err } from "../types/common.js";
import { isPlainObject } from "../utils/is-plain-object.js";
import {
  type AttributeValue,
  type AttributeMap,
  MarshallingError,
  childPath,
} from "./types.js";

const marshallSet = (
  set: ReadonlySet<unknown>,
  path: string,
): Result<AttributeValue, MarshallingError> => {
  const values = [...set];
  if (values.length === 0) {
    return err(new MarshallingError(path, "empty sets cannot be stored"));
  }
  if (values.every((v): v is string => typeof v === "string")) {
    return ok({ SS: values });
  }
  if (values.every((v): v is number | bigint => typeof v === "number" || typeof v === "bigint")) {
    return ok({ NS: values.map(String) });
  }
  if (values.every((v): v is Uint8Array => v instanceof Uint8Array)) {
    return ok({ BS: values });
  }
  return err(
    new MarshallingError(path, "sets must hold only strings, only numbers or only binary values"),
  );
};

/**
 * Marshalls a single value into a DynamoDB AttributeValue.
 *
 * Conversion rules:
 * - `null` / `undefined` -> `{ NULL: true }`
 * - `string` -> `{ S }`, `number` / `bigint` -> `{ N }`, `boolean` -> `{ BOOL }`
 * - `Uint8Array` -> `{ B }`
 * - `Set` of strings, numbers or binaries -> `{ SS }` / `{ NS }` / `{ BS }`
 * - `Array` -> `{ L }`, plain object -> `{ M }`
 *
 * Anything else (class instances such as `Date`, functions, symbols,
 * non-finite numbers) is rejected with the path of the offending value.
 *
 * @param value - The value to marshall
 * @param path - Attribute path used in error messages
 */
export const marshallValue = (
  value: unknown,
  path = "",
): Result<AttributeValue, MarshallingError> => {
  if (value === null || value === undefined) return ok({ NULL: true });

  switch (typeof value) {
    case "string":
      return ok({ S: value });
    case "number":
      return Number.isFinite(value)
        ? ok({ N: String(value) })
        : err(new MarshallingError(path, `non-finite number ${value}`));
    case "bigint":
      return ok({ N: value.toString() });
    case "boolean":
      return ok({ BOOL: value });
    case "object":
      break;
    default:
      return err(new MarshallingError(path, `values of type ${typeof value} cannot be stored`));
  }

  if (value instanceof Uint8Array) return ok({ B: value });
  if (value instanceof Set) return marshallSet(value, path);

  if (Array.isArray(value)) {
    const items: AttributeValue[] = [];
    for (const [index, item] of value.entries()) {
      const result = marshallValue(item, childPath(path, index));
      if (!result.success) return result;
      items.push(result.data);
    }
    return ok({ L: items });
  }

  if (isPlainObject(value)) {
    const map: Record<string, AttributeValue> = {};
    for (const [key, item] of Object.entries(value)) {
      const result = marshallValue(item, childPath(path, key));
      if (!result.success) return result;
      map[key] = result.data;
    }
    return ok({ M: map });
  }

  return err(
    new MarshallingError(path, `instances of ${value.constructor.name} cannot be stored`),
  );
};

/**
 * Marshalls a record of attributes into a DynamoDB item (AttributeMap).
 * `undefined` attributes are skipped.
 */
export const marshallItem = (
  item: Readonly<Record<string, unknown>>,
): Result<AttributeMap, MarshallingError> => {
  const map: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(item)) {
    if (value === undefined) continue;
    const result = marshallValue(value, key);
    if (!result.success) return result;
    map[key] = result.data;
  }
  return ok(map);
};

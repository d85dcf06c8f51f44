/**
 * Unmarshalls DynamoDB AttributeValue format into plain values.
 */

import { type Result, ok, err } from "../types/common.js";
import {
  type AttributeValue,
  type AttributeMap,
  MarshallingError,
  childPath,
} from "./types.js";

/**
 * Unmarshalls a single AttributeValue.
 *
 * Numbers come back as `number`; the attribute coercers turn them into the
 * field's domain type afterwards.
 *
 * @param av - The AttributeValue to unmarshall
 * @param path - Attribute path used in error messages
 */
export const unmarshallValue = (
  av: AttributeValue,
  path = "",
): Result<unknown, MarshallingError> => {
  if ("S" in av) return ok(av.S);
  if ("N" in av) return ok(Number(av.N));
  if ("BOOL" in av) return ok(av.BOOL);
  if ("NULL" in av) return ok(null);
  if ("B" in av) return ok(av.B);
  if ("SS" in av) return ok(new Set(av.SS));
  if ("NS" in av) return ok(new Set(av.NS.map(Number)));
  if ("BS" in av) return ok(new Set(av.BS));

  if ("L" in av) {
    const items: unknown[] = [];
    for (const [index, item] of av.L.entries()) {
      const result = unmarshallValue(item, childPath(path, index));
      if (!result.success) return result;
      items.push(result.data);
    }
    return ok(items);
  }

  if ("M" in av) {
    const obj: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(av.M)) {
      const result = unmarshallValue(item, childPath(path, key));
      if (!result.success) return result;
      obj[key] = result.data;
    }
    return ok(obj);
  }

  return err(new MarshallingError(path, "unrecognized AttributeValue"));
};

/**
 * Unmarshalls a DynamoDB item (AttributeMap) into a plain record.
 */
export const unmarshallItem = (
  item: AttributeMap,
): Result<Record<string, unknown>, MarshallingError> => {
  const obj: Record<string, unknown> = {};
  for (const [key, av] of Object.entries(item)) {
    const result = unmarshallValue(av, key);
    if (!result.success) return result;
    obj[key] = result.data;
  }
  return ok(obj);
};

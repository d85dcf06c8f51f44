/**
 * Structured-text codec used by `serialized` fields that have no custom
 * serializer. Values are stored as JSON text.
 *
 * Only values JSON reads back unchanged are accepted: `null`, strings,
 * booleans, finite numbers, arrays and plain objects of those. Dates, maps,
 * sets and other class instances need a custom serializer.
 */

import { childPath } from "../marshalling/types.js";
import { isPlainObject } from "../utils/is-plain-object.js";

/** Encodes a value into text and back. */
export interface TextCodec {
  readonly encode: (value: unknown) => string;
  readonly decode: (text: string) => unknown;
}

const reject = (path: string, message: string): never => {
  throw new Error(`${path === "" ? "value" : path}: ${message}`);
};

const assertJsonSafe = (value: unknown, path: string): void => {
  if (value === null || typeof value === "string" || typeof value === "boolean") return;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) reject(path, `non-finite number ${value}`);
    return;
  }
  if (Array.isArray(value)) {
    value.forEach((item: unknown, index) => assertJsonSafe(item, childPath(path, index)));
    return;
  }
  if (typeof value !== "object") {
    return reject(path, `values of type ${typeof value} have no JSON form`);
  }
  if (!isPlainObject(value)) {
    return reject(path, `instances of ${value.constructor.name} have no JSON form`);
  }
  // JSON leaves out undefined properties, and reading them back gives undefined again.
  for (const [key, item] of Object.entries(value)) {
    if (item !== undefined) assertJsonSafe(item, childPath(path, key));
  }
};

export const jsonCodec: TextCodec = Object.freeze({
  encode: (value: unknown): string => {
    assertJsonSafe(value, "");
    return JSON.stringify(value);
  },
  decode: (text: string): unknown => JSON.parse(text),
});

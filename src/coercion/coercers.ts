/**
 * Per-type coercion rules.
 *
 * Each coercer has three directions:
 * - `cast`: application input -> domain value (runs on every write)
 * - `dump`: domain value -> wire value sent to DynamoDB
 * - `load`: wire value read from DynamoDB -> domain value
 *
 * `null` never reaches a coercer; the registry maps it to `null` first.
 */

import { getConfig } from "../config/config.js";
import { TypeCastError } from "../errors/errors.js";
import type { FieldDeclaration, FieldType } from "../types/field.js";
import { jsonCodec } from "./codec.js";

/** Coercion rules for one type tag. */
export interface Coercer {
  readonly cast: (input: unknown, field: FieldDeclaration) => unknown;
  readonly dump: (value: unknown, field: FieldDeclaration) => unknown;
  readonly load: (wire: unknown, field: FieldDeclaration) => unknown;
}

const MS_PER_DAY = 86_400_000;
const INTEGER_TEXT = /^[+-]?\d+$/;
const DATE_ONLY_TEXT = /^(\d{4})-(\d{2})-(\d{2})$/;

const fail = (field: FieldDeclaration, value: unknown, cause?: unknown): never => {
  throw new TypeCastError(
    field.name,
    field.type,
    value,
    cause === undefined ? undefined : { cause },
  );
};

// ---------------------------------------------------------------------------
// string
// ---------------------------------------------------------------------------

const toText = (input: unknown, field: FieldDeclaration): string => {
  if (typeof input === "string") return input;
  if (
    typeof input === "number" ||
    typeof input === "bigint" ||
    typeof input === "boolean"
  ) {
    return String(input);
  }
  return fail(field, input);
};

const stringCoercer: Coercer = Object.freeze({
  cast: toText,
  dump: toText,
  load: toText,
});

// ---------------------------------------------------------------------------
// integer
// ---------------------------------------------------------------------------

const toInteger = (input: unknown, field: FieldDeclaration): number => {
  if (typeof input === "number") {
    return Number.isSafeInteger(input) ? input : fail(field, input);
  }
  if (typeof input === "bigint") {
    const n = Number(input);
    return Number.isSafeInteger(n) ? n : fail(field, input);
  }
  if (typeof input === "string") {
    const text = input.trim();
    if (!INTEGER_TEXT.test(text)) return fail(field, input);
    const n = Number(text);
    return Number.isSafeInteger(n) ? n : fail(field, input);
  }
  return fail(field, input);
};

const integerCoercer: Coercer = Object.freeze({
  cast: toInteger,
  dump: toInteger,
  // Items written by other clients may hold fractional numbers. Beyond the
  // safe range the value has already lost digits, so it is refused.
  load: (wire: unknown, field: FieldDeclaration) =>
    toInteger(typeof wire === "number" ? Math.trunc(wire) : wire, field),
});

// ---------------------------------------------------------------------------
// number / float
// ---------------------------------------------------------------------------

const toNumber = (input: unknown, field: FieldDeclaration): number => {
  if (typeof input === "number") {
    return Number.isFinite(input) ? input : fail(field, input);
  }
  if (typeof input === "bigint") return Number(input);
  if (typeof input === "string") {
    const text = input.trim();
    const n = text === "" ? Number.NaN : Number(text);
    return Number.isFinite(n) ? n : fail(field, input);
  }
  return fail(field, input);
};

const numberCoercer: Coercer = Object.freeze({
  cast: toNumber,
  dump: toNumber,
  load: toNumber,
});

// ---------------------------------------------------------------------------
// boolean
// ---------------------------------------------------------------------------

const storesNativeBoolean = (field: FieldDeclaration): boolean =>
  field.storeAsNative ?? getConfig().storeBooleanAsNative;

const booleanCoercer: Coercer = Object.freeze({
  cast: (input: unknown, field: FieldDeclaration) =>
    typeof input === "boolean" ? input : fail(field, input),
  dump: (value: unknown, field: FieldDeclaration) => {
    if (typeof value !== "boolean") return fail(field, value);
    if (storesNativeBoolean(field)) return value;
    return value ? "t" : "f";
  },
  load: (wire: unknown, field: FieldDeclaration) => {
    if (typeof wire === "boolean") return wire;
    if (wire === "t" || wire === "true") return true;
    if (wire === "f" || wire === "false") return false;
    return fail(field, wire);
  },
});

// ---------------------------------------------------------------------------
// datetime
// ---------------------------------------------------------------------------

const storesAsString = (field: FieldDeclaration): boolean =>
  field.storeAsString ??
  (field.type === "date"
    ? getConfig().storeDateAsString
    : getConfig().storeDatetimeAsString);

const validDate = (ms: number, input: unknown, field: FieldDeclaration): Date => {
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? fail(field, input) : date;
};

const toDateTime = (input: unknown, field: FieldDeclaration): Date => {
  if (input instanceof Date) return validDate(input.getTime(), input, field);
  if (typeof input === "number") return validDate(input, input, field);
  if (typeof input === "string") return validDate(Date.parse(input), input, field);
  return fail(field, input);
};

/** Wire numbers are epoch seconds; the fraction carries milliseconds. */
const epochSecondsToDate = (
  seconds: number,
  input: unknown,
  field: FieldDeclaration,
): Date => validDate(Math.round(seconds * 1000), input, field);

const datetimeCoercer: Coercer = Object.freeze({
  cast: toDateTime,
  dump: (value: unknown, field: FieldDeclaration) => {
    const date = toDateTime(value, field);
    return storesAsString(field) ? date.toISOString() : date.getTime() / 1000;
  },
  load: (wire: unknown, field: FieldDeclaration) => {
    if (wire instanceof Date) return validDate(wire.getTime(), wire, field);
    if (typeof wire === "number") return epochSecondsToDate(wire, wire, field);
    if (typeof wire === "string") {
      const seconds = wire.trim() === "" ? Number.NaN : Number(wire);
      return Number.isFinite(seconds)
        ? epochSecondsToDate(seconds, wire, field)
        : validDate(Date.parse(wire), wire, field);
    }
    return fail(field, wire);
  },
});

// ---------------------------------------------------------------------------
// date
// ---------------------------------------------------------------------------

const startOfUtcDay = (ms: number): number => Math.floor(ms / MS_PER_DAY) * MS_PER_DAY;

const parseDateOnly = (text: string): number | undefined => {
  const match = DATE_ONLY_TEXT.exec(text);
  if (!match) return undefined;
  const [, year, month, day] = match;
  const ms = Date.UTC(Number(year), Number(month) - 1, Number(day));
  const check = new Date(ms);
  // Rejects rollovers such as 2024-02-30.
  return check.getUTCDate() === Number(day) && check.getUTCMonth() === Number(month) - 1
    ? ms
    : undefined;
};

const toDate = (input: unknown, field: FieldDeclaration): Date => {
  if (typeof input === "string") {
    const dateOnly = parseDateOnly(input.trim());
    if (dateOnly !== undefined) return new Date(dateOnly);
  }
  const instant = toDateTime(input, field);
  return new Date(startOfUtcDay(instant.getTime()));
};

const formatDateOnly = (date: Date): string => date.toISOString().slice(0, 10);

const dateCoercer: Coercer = Object.freeze({
  cast: toDate,
  dump: (value: unknown, field: FieldDeclaration) => {
    const date = toDate(value, field);
    return storesAsString(field)
      ? formatDateOnly(date)
      : Math.floor(date.getTime() / MS_PER_DAY);
  },
  load: (wire: unknown, field: FieldDeclaration) => {
    if (typeof wire === "number") {
      return Number.isInteger(wire)
        ? validDate(wire * MS_PER_DAY, wire, field)
        : fail(field, wire);
    }
    if (typeof wire === "string" && INTEGER_TEXT.test(wire.trim())) {
      return validDate(Number(wire.trim()) * MS_PER_DAY, wire, field);
    }
    return toDate(wire, field);
  },
});

// ---------------------------------------------------------------------------
// serialized
// ---------------------------------------------------------------------------

const serializedCoercer: Coercer = Object.freeze({
  cast: (input: unknown) => input,
  dump: (value: unknown, field: FieldDeclaration) => {
    // Custom serializer errors propagate untouched.
    if (field.serializer) return field.serializer.dump(value);
    try {
      return jsonCodec.encode(value);
    } catch (cause) {
      return fail(field, value, cause);
    }
  },
  load: (wire: unknown, field: FieldDeclaration) => {
    if (field.serializer) return field.serializer.load(wire);
    if (typeof wire !== "string") return wire;
    try {
      return jsonCodec.decode(wire);
    } catch (cause) {
      return fail(field, wire, cause);
    }
  },
});

// ---------------------------------------------------------------------------
// raw
// ---------------------------------------------------------------------------

const rawCoercer: Coercer = Object.freeze({
  cast: (input: unknown) => input,
  dump: (value: unknown) => value,
  load: (wire: unknown) => wire,
});

/** Coercer for every type tag. `float` shares the `number` rules. */
export const COERCERS: Readonly<Record<FieldType, Coercer>> = Object.freeze({
  string: stringCoercer,
  integer: integerCoercer,
  number: numberCoercer,
  float: numberCoercer,
  boolean: booleanCoercer,
  datetime: datetimeCoercer,
  date: dateCoercer,
  serialized: serializedCoercer,
  raw: rawCoercer,
});

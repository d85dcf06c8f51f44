/**
 * Errors raised synchronously by the attribute layer.
 *
 * Persistence operations report store failures through `Result` values
 * (see {@link DynamoError}); these classes cover mistakes made at the call
 * site, which surface at the line that caused them.
 */

/** Discriminant carried by every error raised by this library. */
export type ItemFieldErrorType = "unknown-field" | "type-cast" | "config";

/** Base class for attribute-layer errors. */
export abstract class ItemFieldError extends Error {
  abstract readonly type: ItemFieldErrorType;

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised when a read or write names a field that is not part of the
 * model's field set (never declared, or removed since).
 */
export class UnknownFieldError extends ItemFieldError {
  override readonly type = "unknown-field" as const;

  constructor(
    readonly modelName: string,
    readonly field: string,
  ) {
    super(`Unknown field "${field}" on model ${modelName}`);
  }
}

/**
 * Raised when a value cannot be interpreted as the declared field type.
 */
export class TypeCastError extends ItemFieldError {
  override readonly type = "type-cast" as const;

  constructor(
    readonly field: string,
    readonly fieldType: string,
    readonly value: unknown,
    options?: { readonly cause?: unknown },
  ) {
    super(
      `Cannot cast ${describeValue(value)} to ${fieldType} for field "${field}"`,
      options,
    );
  }
}

/** A single problem found in a configuration or declaration. */
export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

/** Raised for invalid settings or field declarations. */
export class ConfigError extends ItemFieldError {
  override readonly type = "config" as const;

  constructor(
    message: string,
    readonly issues: readonly ConfigIssue[] = [],
  ) {
    super(
      issues.length > 0
        ? `${message}: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ")}`
        : message,
    );
  }
}

const describeValue = (value: unknown): string => {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }
  if (Array.isArray(value)) return "array";
  if (typeof value === "object" && value !== null) return "object";
  return String(value);
};

/**
 * Process-wide settings.
 *
 * Settings are read at call time, so changing them with `configure()`
 * affects documents and models that already exist.
 */

import { z } from "zod";
import { ConfigError } from "../errors/errors.js";
import { type Logger, consoleLogger, isLogger } from "./logger.js";

const configSchema = z
  .object({
    /** Populate and persist `createdAt` / `updatedAt` on save. */
    timestamps: z.boolean(),
    logger: z.custom<Logger>(isLogger, {
      message: "Expected an object with debug, info, warn and error methods",
    }),
    /** Store `datetime` fields as ISO-8601 text instead of epoch seconds. */
    storeDatetimeAsString: z.boolean(),
    /** Store `date` fields as `YYYY-MM-DD` text instead of days since epoch. */
    storeDateAsString: z.boolean(),
    /** Store `boolean` fields as native BOOL values instead of `"t"` / `"f"`. */
    storeBooleanAsNative: z.boolean(),
    /** Field holding the model name of single-table-inheritance children. */
    inheritanceField: z.string().min(1),
    /** Prefix prepended to every table name. */
    namespace: z.string(),
  })
  .strict();

/** Resolved configuration. */
export type ItemFieldConfig = z.output<typeof configSchema>;

/** Input accepted by {@link configure}. */
export type ConfigInput = {
  readonly [K in keyof ItemFieldConfig]?: ItemFieldConfig[K];
};

const DEFAULT_CONFIG: ItemFieldConfig = Object.freeze({
  timestamps: true,
  logger: consoleLogger,
  storeDatetimeAsString: false,
  storeDateAsString: false,
  storeBooleanAsNative: true,
  inheritanceField: "type",
  namespace: "",
});

let current: ItemFieldConfig = DEFAULT_CONFIG;

/**
 * Merges `input` into the current configuration.
 *
 * @throws {ConfigError} when a setting is unknown or has the wrong shape
 *
 * @example
 * ```ts
 * configure({ timestamps: false, namespace: "test_" });
 * ```
 */
export const configure = (input: ConfigInput): ItemFieldConfig => {
  const parsed = configSchema.safeParse({ ...current, ...input });
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid configuration",
      parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    );
  }
  current = Object.freeze(parsed.data);
  return current;
};

/** Returns the current configuration. */
export const getConfig = (): ItemFieldConfig => current;

/** Restores the default configuration. */
export const resetConfig = (): void => {
  current = DEFAULT_CONFIG;
};

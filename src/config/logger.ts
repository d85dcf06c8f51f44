/**
 * Logging sink used for deprecation notices and persistence traces.
 *
 * Any object with these four methods can be supplied through `configure()`;
 * the library never writes anywhere else.
 */

export type LogContext = Readonly<Record<string, unknown>>;

/** Minimal logger contract. */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const PREFIX = "[itemfield]";

const withContext = (
  message: string,
  context: LogContext | undefined,
): unknown[] => (context ? [`${PREFIX} ${message}`, context] : [`${PREFIX} ${message}`]);

/** Default logger: writes to the console with a library prefix. */
export const consoleLogger: Logger = Object.freeze({
  debug: (message: string, context?: LogContext) =>
    console.debug(...withContext(message, context)),
  info: (message: string, context?: LogContext) =>
    console.info(...withContext(message, context)),
  warn: (message: string, context?: LogContext) =>
    console.warn(...withContext(message, context)),
  error: (message: string, context?: LogContext) =>
    console.error(...withContext(message, context)),
});

/** Logger that discards everything. */
export const silentLogger: Logger = Object.freeze({
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
});

/** Returns true if `value` can be used as a {@link Logger}. */
export const isLogger = (value: unknown): value is Logger =>
  typeof value === "object" &&
  value !== null &&
  "debug" in value &&
  typeof value.debug === "function" &&
  "info" in value &&
  typeof value.info === "function" &&
  "warn" in value &&
  typeof value.warn === "function" &&
  "error" in value &&
  typeof value.error === "function";

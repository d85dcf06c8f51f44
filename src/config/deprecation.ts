import { getConfig } from "./config.js";

const warned = new Set<string>();

/**
 * Logs `message` through the configured logger the first time `key` is seen
 * in this process. Later calls with the same key do nothing.
 */
export const warnDeprecatedOnce = (key: string, message: string): void => {
  if (warned.has(key)) return;
  warned.add(key);
  getConfig().logger.warn(message, { deprecation: key });
};

/** Forgets which deprecations were already reported. */
export const resetDeprecationWarnings = (): void => {
  warned.clear();
};

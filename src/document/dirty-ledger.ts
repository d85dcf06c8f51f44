/**
 * Dirty tracking for a single document.
 *
 * A field gets a ledger entry the first time it is written after a clean
 * point; the entry keeps the clean value and the current value is always read
 * from the attribute store. A field whose current value equals its clean value
 * is not reported, even if it was reassigned in between.
 */

import { deepEqual } from "../utils/equality.js";

/** Before/after pair for a changed field. */
export type AttributeChange = readonly [before: unknown, after: unknown];

export interface DirtyLedger {
  /** Notes a write; only the first write after a clean point keeps `before`. */
  readonly record: (name: string, before: unknown) => void;
  /** Makes `value` the clean value of `name`. */
  readonly markClean: (name: string, value: unknown) => void;
  /** Drops every entry: current values become the clean values. */
  readonly markAllClean: () => void;
  readonly changedFields: () => ReadonlySet<string>;
  readonly changeFor: (name: string) => AttributeChange | undefined;
  /** Clean value of `name`, or its current value if it has not changed. */
  readonly wasValue: (name: string) => unknown;
}

interface LedgerEntry {
  readonly clean: unknown;
}

/**
 * Creates a ledger reading current values through `readCurrent`, and
 * considering only names for which `isTracked` returns true.
 */
export const createDirtyLedger = (
  readCurrent: (name: string) => unknown,
  isTracked: (name: string) => boolean,
): DirtyLedger => {
  const entries = new Map<string, LedgerEntry>();

  const changeFor = (name: string): AttributeChange | undefined => {
    const entry = entries.get(name);
    if (!entry || !isTracked(name)) return undefined;
    const current = readCurrent(name);
    return deepEqual(entry.clean, current) ? undefined : [entry.clean, current];
  };

  return Object.freeze({
    record: (name: string, before: unknown) => {
      if (!entries.has(name)) entries.set(name, { clean: before });
    },

    markClean: (name: string, value: unknown) => {
      if (deepEqual(value, readCurrent(name))) {
        entries.delete(name);
      } else {
        entries.set(name, { clean: value });
      }
    },

    markAllClean: () => entries.clear(),

    changedFields: () => {
      const changed = new Set<string>();
      for (const name of entries.keys()) {
        if (changeFor(name)) changed.add(name);
      }
      return changed;
    },

    changeFor,

    wasValue: (name: string) => {
      const entry = entries.get(name);
      return entry ? entry.clean : readCurrent(name);
    },
  });
};

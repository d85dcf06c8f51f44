/**
 * Outcome of a persistence call. Store and marshalling failures are returned
 * as `{ success: false }`; attribute errors are thrown instead.
 */
export type Result<T, E = Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

export const ok = <T>(data: T): Result<T, never> =>
  Object.freeze({ success: true as const, data });

export const err = <E>(error: E): Result<never, E> =>
  Object.freeze({ success: false as const, error });

/**
 * Brand helper for "parse, don't validate".
 *
 * A branded type proves validation happened at a boundary, e.g. a string that
 * is known to be a well-formed `file:` URL.
 *
 * NOTE: Use a string-keyed marker instead of a `unique symbol` so exported
 * zod schemas that transform into branded types stay nameable (TS4023).
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

/**
 * Nominal typing for primitives that have passed a boundary check.
 *
 * A string-keyed marker is used rather than a `unique symbol` so branded types
 * can appear in exported zod schemas without TS4023.
 *
 * Erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

/**
 * Nominal typing helper.
 *
 * A branded value can only be produced by the parser that owns the brand, so a
 * function that asks for `Brand<number, 'ListenPort'>` knows the number was
 * range-checked at the boundary. Brands exist only at compile time.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

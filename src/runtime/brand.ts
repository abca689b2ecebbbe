/**
 * Nominal typing for primitives that crossed a parsing boundary.
 *
 * A `SplitName` is a `string` the naming grammar accepted; a `Sha256Digest`
 * is a `string` produced by the hashing port. Brands are erased at runtime.
 *
 * NOTE: a string-keyed marker (not a `unique symbol`) keeps zod transforms
 * into branded types nameable when their schemas are exported.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

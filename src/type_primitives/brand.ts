/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime; it only stops a
 * structurally identical value from being passed where the branded one
 * is expected.
 *
 * Example: an arena Index is a plain { slot, generation } object at
 * runtime, but an object literal of that shape is not an Index until it
 * goes through create_index.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};

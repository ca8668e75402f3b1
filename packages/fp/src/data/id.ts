/**
 * Id (Identity)
 *
 * Id<A> ≅ A
 *
 * The identity functor: no structure and no effect. It is the base case
 * for the generalized folds and unfolds (a fold whose comonad is Id is a
 * plain catamorphism) and the monad that turns a monadic fold back into
 * a pure one.
 *
 * Id is a type alias, so values are not wrapped.
 */

import type { Id } from "../hkt.js";

export type { Id } from "../hkt.js";

// ============================================================================
// Operations
// ============================================================================

/**
 * Lift a value into Id
 */
export function of<A>(a: A): Id<A> {
  return a;
}

/**
 * Extract the value
 */
export function extract<A>(ia: Id<A>): A {
  return ia;
}

/**
 * Map over the value
 */
export function map<A, B>(ia: Id<A>, f: (a: A) => B): Id<B> {
  return f(ia);
}

/**
 * FlatMap - sequence Id computations
 */
export function flatMap<A, B>(ia: Id<A>, f: (a: A) => Id<B>): Id<B> {
  return f(ia);
}

/**
 * Extend a function over the (only) position
 */
export function coflatMap<A, B>(ia: Id<A>, f: (ia: Id<A>) => B): Id<B> {
  return f(ia);
}

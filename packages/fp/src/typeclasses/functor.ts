/**
 * Functor Typeclass
 *
 * A type class of types that can be mapped over.
 * Instances must satisfy the following laws:
 *   - Identity: fa.map(a => a) === fa
 *   - Composition: fa.map(f).map(g) === fa.map(a => g(f(a)))
 *
 * All derived operations accept the typeclass dictionary as the first argument
 * and return a function specialized to that instance.
 */

import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Functor
// ============================================================================

/**
 * Functor typeclass interface.
 */
export interface Functor<F extends TypeFunction> {
  readonly map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Replace all A values with a constant B value
 */
export function as<F extends TypeFunction>(F: Functor<F>): <A, B>(fa: $<F, A>, b: B) => $<F, B> {
  return (fa, b) => F.map(fa, () => b);
}

/**
 * Replace all A values with void/undefined
 */
export function void_<F extends TypeFunction>(F: Functor<F>): <A>(fa: $<F, A>) => $<F, void> {
  return (fa) => F.map(fa, () => undefined);
}

/**
 * Pair each value with the result of applying f to it
 */
export function fproduct<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, readonly [A, B]> {
  return (fa, f) => F.map(fa, (a) => [a, f(a)] as const);
}

/**
 * Lift a function to work on Functor values
 */
export function lift<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(f: (a: A) => B) => (fa: $<F, A>) => $<F, B> {
  return (f) => (fa) => F.map(fa, f);
}

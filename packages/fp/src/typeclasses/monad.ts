/**
 * FlatMap and Monad Typeclasses
 *
 * FlatMap adds flatMap (bind) to Apply - sequencing dependent computations.
 * Monad combines FlatMap with Applicative.
 *
 * Laws:
 *   - Left identity: pure(a).flatMap(f) === f(a)
 *   - Right identity: m.flatMap(pure) === m
 *   - Associativity: m.flatMap(f).flatMap(g) === m.flatMap(a => f(a).flatMap(g))
 */

import type { Applicative, Apply } from "./applicative.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// FlatMap
// ============================================================================

/**
 * FlatMap typeclass - adds flatMap to Apply
 */
export interface FlatMap<F extends TypeFunction> extends Apply<F> {
  readonly flatMap: <A, B>(fa: $<F, A>, f: (a: A) => $<F, B>) => $<F, B>;
}

// ============================================================================
// Monad
// ============================================================================

/**
 * Monad typeclass - combines FlatMap with Applicative
 */
export interface Monad<F extends TypeFunction> extends FlatMap<F>, Applicative<F> {}

// ============================================================================
// Derived Operations from FlatMap
// ============================================================================

/**
 * Flatten a nested structure
 */
export function flatten<F extends TypeFunction>(F: FlatMap<F>): <A>(ffa: $<F, $<F, A>>) => $<F, A> {
  return <A>(ffa: $<F, $<F, A>>) => F.flatMap(ffa, (x: $<F, A>) => x);
}

// ============================================================================
// Instance Creation Helpers
// ============================================================================

/**
 * Create a Monad from pure and flatMap; map and ap are derived
 */
export function makeMonad<F extends TypeFunction>(
  pure: <A>(a: A) => $<F, A>,
  flatMap: <A, B>(fa: $<F, A>, f: (a: A) => $<F, B>) => $<F, B>,
): Monad<F> {
  return {
    pure,
    flatMap,
    map: <A, B>(fa: $<F, A>, f: (a: A) => B) => flatMap(fa, (a: A) => pure(f(a))),
    ap: <A, B>(fab: $<F, (a: A) => B>, fa: $<F, A>) =>
      flatMap(fab, (f: (a: A) => B) => flatMap(fa, (a: A) => pure(f(a)))),
  };
}

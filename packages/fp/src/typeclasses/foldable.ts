/**
 * Foldable Typeclass
 *
 * Data structures that can be reduced to a summary value.
 * Folds visit elements left to right.
 *
 * Laws:
 *   - foldRight is consistent with foldMap using Endo monoid
 *   - foldLeft is consistent with foldMap using Dual Endo monoid
 */

import type { Monoid } from "./semigroup.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Foldable
// ============================================================================

/**
 * Foldable typeclass
 */
export interface Foldable<F extends TypeFunction> {
  readonly foldLeft: <A, B>(fa: $<F, A>, b: B, f: (b: B, a: A) => B) => B;
  readonly foldRight: <A, B>(fa: $<F, A>, b: B, f: (a: A, b: B) => B) => B;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Map each element to a monoid and combine
 */
export function foldMap<F extends TypeFunction>(
  F: Foldable<F>,
): <M>(M: Monoid<M>) => <A>(fa: $<F, A>, f: (a: A) => M) => M {
  return (M) => (fa, f) => F.foldLeft(fa, M.empty, (acc, a) => M.combine(acc, f(a)));
}

/**
 * Combine all elements using a monoid
 */
export function fold<F extends TypeFunction>(F: Foldable<F>): <A>(M: Monoid<A>) => (fa: $<F, A>) => A {
  return (M) => (fa) => F.foldLeft(fa, M.empty, M.combine);
}

/**
 * Collect the elements in order
 */
export function toArray<F extends TypeFunction>(F: Foldable<F>): <A>(fa: $<F, A>) => A[] {
  return <A>(fa: $<F, A>) =>
    F.foldLeft<A, A[]>(fa, [], (acc, a) => {
      acc.push(a);
      return acc;
    });
}

/**
 * Count the elements
 */
export function size<F extends TypeFunction>(F: Foldable<F>): <A>(fa: $<F, A>) => number {
  return (fa) => F.foldLeft(fa, 0, (n) => n + 1);
}

/**
 * Check if there are no elements
 */
export function isEmpty<F extends TypeFunction>(F: Foldable<F>): <A>(fa: $<F, A>) => boolean {
  return (fa) => F.foldLeft(fa, true, () => false);
}

/**
 * Shape layers
 *
 * A shape is one layer of a recursive structure with its recursive
 * positions abstracted out: `$<F, A>` holds children of type `A`. The
 * engine only ever touches layers through a `Shape<F>` dictionary.
 *
 * A lawful shape's `map`, `foldLeft` and `traverse` all visit the same
 * children in the same left-to-right order, and `map` keeps every child in
 * its position.
 */

import { StrataError, S1002 } from "@strata/core";
import { size, stateMonad } from "@strata/fp";
import type { $, Eq, Foldable, Functor, Show, State, StateF, Traverse, TypeFunction } from "@strata/fp";

// ============================================================================
// Capabilities
// ============================================================================

export interface Shape<F extends TypeFunction> extends Traverse<F> {
  /** Lift an equality on children to an equality on layers */
  readonly eq1: <A>(E: Eq<A>) => Eq<$<F, A>>;
  /** Lift a renderer for children to a renderer for layers */
  readonly show1: <A>(S: Show<A>) => Show<$<F, A>>;
}

/**
 * Split a layer of pairs into two layers of the same shape.
 *
 * Kept separate from `Shape` so each shape decides how to provide it.
 */
export interface Unzip<F extends TypeFunction> {
  readonly unzip: <A, B>(fab: $<F, readonly [A, B]>) => readonly [$<F, A>, $<F, B>];
}

/**
 * Unzip by mapping the layer twice.
 */
export function unzipByMap<F extends TypeFunction>(F: Functor<F>): Unzip<F> {
  return {
    unzip: <A, B>(fab: $<F, readonly [A, B]>): readonly [$<F, A>, $<F, B>] => [
      F.map(fab, (p: readonly [A, B]) => p[0]),
      F.map(fab, (p: readonly [A, B]) => p[1]),
    ],
  };
}

// ============================================================================
// Derived Operations
// ============================================================================

export function childCount<F extends TypeFunction>(F: Foldable<F>): <A>(fa: $<F, A>) => number {
  return size(F);
}

/**
 * Map with the child's left-to-right position
 */
export function mapWithIndex<F extends TypeFunction>(
  F: Traverse<F>,
): <A, B>(fa: $<F, A>, f: (a: A, index: number) => B) => $<F, B> {
  const S = stateMonad<number>();
  return <A, B>(fa: $<F, A>, f: (a: A, index: number) => B): $<F, B> => {
    const numbered = F.traverse<StateF<number>>(S)<A, B>(fa, (a: A): State<number, B> => (n) => [f(a, n), n + 1]);
    return numbered(0)[0];
  };
}

/**
 * Rebuild a layer from an ordered list of replacement children.
 *
 * @throws StrataError S1002 when the list length differs from the child count
 */
export function fillLayer<F extends TypeFunction>(
  F: Traverse<F>,
): <A, B>(fa: $<F, A>, children: readonly B[]) => $<F, B> {
  const count = childCount(F);
  const withIndex = mapWithIndex(F);
  return <A, B>(fa: $<F, A>, children: readonly B[]): $<F, B> => {
    const expected = count(fa);
    if (expected !== children.length) {
      throw new StrataError(S1002, { expected, actual: children.length });
    }
    return withIndex<A, B>(fa, (_: A, i: number) => children[i]);
  };
}

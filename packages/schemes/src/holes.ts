/**
 * Holes
 *
 * Focus on each child of a layer in turn, paired with a function that puts
 * a replacement back in that position. The other children of a rebuilt
 * layer are the same values as before.
 */

import { toArray } from "@strata/fp";
import type { $, Option, Traverse, TypeFunction } from "@strata/fp";
import { mapWithIndex } from "./shape.js";

export type Hole<F extends TypeFunction, A> = readonly [A, (replacement: A) => $<F, A>];

export function holes<F extends TypeFunction>(F: Traverse<F>): <A>(fa: $<F, A>) => $<F, Hole<F, A>> {
  const withIndex = mapWithIndex(F);
  return <A>(fa: $<F, A>): $<F, Hole<F, A>> =>
    withIndex<A, Hole<F, A>>(fa, (a: A, i: number) => [
      a,
      (replacement: A) => withIndex<A, A>(fa, (original: A, j: number) => (j === i ? replacement : original)),
    ]);
}

export function holesList<F extends TypeFunction>(F: Traverse<F>): <A>(fa: $<F, A>) => Hole<F, A>[] {
  const list = toArray(F);
  const layer = holes(F);
  return <A>(fa: $<F, A>): Hole<F, A>[] => list<Hole<F, A>>(layer<A>(fa));
}

/**
 * The child at a left-to-right position.
 */
export function projectAt<F extends TypeFunction>(F: Traverse<F>): <A>(index: number, fa: $<F, A>) => Option<A> {
  const list = toArray(F);
  return <A>(index: number, fa: $<F, A>): Option<A> => {
    const all = list<A>(fa);
    return Number.isInteger(index) && index >= 0 && index < all.length ? all[index] : null;
  };
}

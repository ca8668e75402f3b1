/**
 * Recursive and Corecursive capabilities
 *
 * A term type `T` is recursive over a shape `F` when one layer can be
 * peeled off (`project`), and corecursive when one layer can be wrapped up
 * (`embed`). Every scheme is written against these descriptors, so the
 * same fold runs on `Fix`, `Mu` or an attributed term.
 */

import type { $, Eq, Show, TypeFunction } from "@strata/fp";
import type { Shape } from "./shape.js";

export interface Recursive<T, F extends TypeFunction> {
  readonly shape: Shape<F>;
  readonly project: (t: T) => $<F, T>;
}

export interface Corecursive<T, F extends TypeFunction> {
  readonly shape: Shape<F>;
  readonly embed: (ft: $<F, T>) => T;
}

/**
 * Both directions; `project(embed(x))` gives back `x`.
 */
export interface Birecursive<T, F extends TypeFunction> extends Recursive<T, F>, Corecursive<T, F> {}

/**
 * Structural equality through the shape's lifted equality.
 */
export function recursiveEq<T, F extends TypeFunction>(R: Recursive<T, F>): Eq<T> {
  const eq: Eq<T> = {
    eqv: (x, y) => R.shape.eq1(eq).eqv(R.project(x), R.project(y)),
  };
  return eq;
}

/**
 * Rendering through the shape's lifted `show`.
 */
export function recursiveShow<T, F extends TypeFunction>(R: Recursive<T, F>): Show<T> {
  const show: Show<T> = {
    show: (t) => R.shape.show1(show).show(R.project(t)),
  };
  return show;
}

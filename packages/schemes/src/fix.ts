/**
 * Fix - the explicit fixpoint of a shape
 *
 * `Fix<F>` ties the knot: each node stores one layer whose children are
 * again `Fix<F>`.
 *
 * @example
 * ```typescript
 * const exp = fix(ExpShape);
 * const two = exp.embed({ _tag: "Num", value: 2 });
 * exp.project(two); // → { _tag: "Num", value: 2 }
 * ```
 */

import type { $, Eq, Show, TypeFunction } from "@strata/fp";
import type { Shape } from "./shape.js";
import { recursiveEq, recursiveShow } from "./recursive.js";
import type { Birecursive } from "./recursive.js";

export interface Fix<F extends TypeFunction> {
  readonly unFix: $<F, Fix<F>>;
}

export function fix<F extends TypeFunction>(S: Shape<F>): Birecursive<Fix<F>, F> {
  return {
    shape: S,
    project: (t) => t.unFix,
    embed: (ft) => ({ unFix: ft }),
  };
}

export function fixEq<F extends TypeFunction>(S: Shape<F>): Eq<Fix<F>> {
  return recursiveEq(fix(S));
}

export function fixShow<F extends TypeFunction>(S: Shape<F>): Show<Fix<F>> {
  return recursiveShow(fix(S));
}

/**
 * Mu - the Church-encoded least fixpoint
 *
 * A `Mu<F>` is nothing but its own fold: given an algebra it produces the
 * algebra's result. `embed` is cheap; `project` has to fold the whole term,
 * so schemes that project repeatedly cost more here than on `Fix`.
 */

import type { $, TypeFunction } from "@strata/fp";
import type { Algebra } from "./algebra.js";
import type { Shape } from "./shape.js";
import type { Birecursive } from "./recursive.js";

export interface Mu<F extends TypeFunction> {
  readonly fold: <A>(alg: Algebra<F, A>) => A;
}

export function mu<F extends TypeFunction>(S: Shape<F>): Birecursive<Mu<F>, F> {
  const embed = (ft: $<F, Mu<F>>): Mu<F> => ({
    fold: <A>(alg: Algebra<F, A>): A => alg(S.map(ft, (t: Mu<F>) => t.fold<A>(alg))),
  });

  return {
    shape: S,
    embed,
    project: (t) => t.fold<$<F, Mu<F>>>((ff: $<F, $<F, Mu<F>>>) => S.map(ff, embed)),
  };
}

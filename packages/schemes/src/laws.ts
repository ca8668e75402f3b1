/**
 * Laws for recursive descriptors and distributive laws
 *
 * Both return plain law sets to be checked with `verifyLaws` or `forAll`
 * from `@strata/testing`.
 *
 * @module
 */

import { duplicate } from "@strata/fp";
import type { $, Comonad, Eq, Functor, LawSet, TypeFunction } from "@strata/fp";
import type { DistributiveLaw } from "./distributive.js";
import type { Birecursive } from "./recursive.js";

/**
 * `embed` and `project` undo each other.
 */
export function recursiveLaws<T, F extends TypeFunction>(B: Birecursive<T, F>, E: Eq<T>): LawSet<T> {
  const layerEq = B.shape.eq1(E);
  return [
    {
      name: "embed after project",
      check: (t) => E.eqv(B.embed(B.project(t)), t),
    },
    {
      name: "project after embed",
      check: (t) => layerEq.eqv(B.project(B.embed(B.project(t))), B.project(t)),
    },
  ];
}

/**
 * Coherence of a fold-side distributive law with its comonad. A law that
 * reorders or drops children, or loses the context, fails one of these.
 *
 * @param eqW - lifts an equality through `W`
 */
export function distributiveLaws<F extends TypeFunction, W extends TypeFunction, A>(
  F: Functor<F>,
  W: Comonad<W>,
  k: DistributiveLaw<F, W>,
  eqW: <X>(E: Eq<X>) => Eq<$<W, X>>,
  EqFA: Eq<$<F, A>>,
): LawSet<$<F, $<W, A>>> {
  const dup = duplicate(W);
  const nestedEq = eqW(eqW(EqFA));
  return [
    {
      name: "distributive counit",
      description: "extracting after distributing equals extracting every child",
      check: (fwa) =>
        EqFA.eqv(
          W.extract<$<F, A>>(k<A>(fwa)),
          F.map(fwa, (wa: $<W, A>) => W.extract<A>(wa)),
        ),
    },
    {
      name: "distributive comultiplication",
      description: "duplicating after distributing equals distributing twice",
      check: (fwa) =>
        nestedEq.eqv(
          dup<$<F, A>>(k<A>(fwa)),
          W.map<$<F, $<W, A>>, $<F, A>>(
            k<$<W, A>>(F.map(fwa, (wa: $<W, A>) => dup<A>(wa))),
            (x: $<F, $<W, A>>) => k<A>(x),
          ),
        ),
    },
  ];
}

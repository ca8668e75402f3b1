/**
 * Comonad Laws
 *
 *   - Left identity: W.coflatMap(wa, W.extract) === wa
 *   - Right identity: W.extract(W.coflatMap(wa, f)) === f(wa)
 *   - Associativity: coflatMap(coflatMap(wa, f), g) === coflatMap(wa, x => g(coflatMap(x, f)))
 *
 * @module
 */

import type { Comonad } from "../typeclasses/comonad.js";
import type { Eq } from "../typeclasses/eq.js";
import type { $, TypeFunction } from "../hkt.js";
import type { LawSet } from "./types.js";

/**
 * Generate laws for a Comonad instance.
 *
 * @param f - first cokleisli arrow
 * @param g - second cokleisli arrow
 */
export function comonadLaws<W extends TypeFunction, A>(
  W: Comonad<W>,
  EqWA: Eq<$<W, A>>,
  EqA: Eq<A>,
  f: (wa: $<W, A>) => A,
  g: (wa: $<W, A>) => A,
): LawSet<$<W, A>> {
  return [
    {
      name: "comonad left identity",
      check: (wa) => EqWA.eqv(W.coflatMap<A, A>(wa, (x) => W.extract<A>(x)), wa),
    },
    {
      name: "comonad right identity",
      check: (wa) => EqA.eqv(W.extract<A>(W.coflatMap<A, A>(wa, f)), f(wa)),
    },
    {
      name: "comonad associativity",
      check: (wa) =>
        EqWA.eqv(
          W.coflatMap<A, A>(W.coflatMap<A, A>(wa, f), g),
          W.coflatMap<A, A>(wa, (x) => g(W.coflatMap<A, A>(x, f))),
        ),
    },
  ];
}

/**
 * Functor Laws
 *
 * Functor Laws:
 *   - Identity: F.map(fa, a => a) === fa
 *   - Composition: F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))
 *
 * @module
 */

import type { Functor } from "../typeclasses/functor.js";
import type { Eq } from "../typeclasses/eq.js";
import type { $, TypeFunction } from "../hkt.js";
import type { LawSet } from "./types.js";

// ============================================================================
// Functor Laws
// ============================================================================

/**
 * Generate laws for a Functor instance.
 *
 * @param EqFA - equality for F[A]
 * @param f - first function of the composition law
 * @param g - second function of the composition law
 *
 * @example
 * ```typescript
 * const laws = functorLaws(optionMonad, getEq(eqNumber), (n) => n + 1, (n) => n * 2);
 * ```
 */
export function functorLaws<F extends TypeFunction, A>(
  F: Functor<F>,
  EqFA: Eq<$<F, A>>,
  f: (a: A) => A,
  g: (a: A) => A,
): LawSet<$<F, A>> {
  return [
    {
      name: "identity",
      description: "Mapping identity preserves structure: F.map(fa, a => a) === fa",
      check: (fa) => EqFA.eqv(F.map<A, A>(fa, (a) => a), fa),
    },
    {
      name: "composition",
      description: "Mapping composes: F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))",
      check: (fa) => EqFA.eqv(F.map<A, A>(F.map<A, A>(fa, f), g), F.map<A, A>(fa, (a) => g(f(a)))),
    },
  ];
}

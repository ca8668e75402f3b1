/**
 * Traverse Laws
 *
 * Traverse Laws:
 *   - Identity: traverse(Id)(fa, f) === F.map(fa, f)
 *   - Purity: traverse(Option)(fa, Some) === Some(fa)
 *   - Order: the effects of traverse run in the same order as foldLeft
 *
 * @module
 */

import type { Traverse } from "../typeclasses/traverse.js";
import type { Eq } from "../typeclasses/eq.js";
import { toArray } from "../typeclasses/foldable.js";
import { monoidArray } from "../typeclasses/semigroup.js";
import { constApplicative, idMonad, optionMonad } from "../instances.js";
import type { $, IdF, OptionF, TypeFunction } from "../hkt.js";
import type { LawSet } from "./types.js";
import { combineLaws } from "./types.js";
import { functorLaws } from "./functor.js";

// ============================================================================
// Traverse Laws
// ============================================================================

/**
 * Generate laws for a Traverse instance, including the Functor laws.
 *
 * @param EqFA - equality for F[A]
 * @param EqA - equality for the elements, used by the order law
 * @param f - a function used by the identity and composition laws
 */
export function traverseLaws<F extends TypeFunction, A>(
  T: Traverse<F>,
  EqFA: Eq<$<F, A>>,
  EqA: Eq<A>,
  f: (a: A) => A,
): LawSet<$<F, A>> {
  const collect = T.traverse(constApplicative(monoidArray<A>()));
  const elements = toArray(T);

  return combineLaws(functorLaws(T, EqFA, f, f), [
    {
      name: "traverse identity",
      description: "Traversing with the identity effect is map",
      check: (fa) => EqFA.eqv(T.traverse<IdF>(idMonad)<A, A>(fa, f), T.map<A, A>(fa, f)),
    },
    {
      name: "traverse purity",
      description: "Traversing with an effect that always succeeds rebuilds the same structure",
      check: (fa) => {
        const rebuilt = T.traverse<OptionF>(optionMonad)<A, A>(fa, (a) => a);
        return rebuilt !== null && EqFA.eqv(rebuilt, fa);
      },
    },
    {
      name: "traverse order",
      description: "traverse visits elements in foldLeft order",
      check: (fa) => {
        const visited = collect<A, A>(fa, (a) => [a]);
        const folded = elements<A>(fa);
        return visited.length === folded.length && visited.every((a, i) => EqA.eqv(a, folded[i]));
      },
    },
  ]);
}

/**
 * Law Definitions
 *
 * Laws are data: each law set is a list of named predicates over one
 * generated input, checked by `verifyLaws` from `@strata/testing`.
 *
 * ```typescript
 * import { functorLaws } from "@strata/fp";
 * import { verifyLaws, Gen } from "@strata/testing";
 *
 * verifyLaws(functorLaws(optionMonad, getEq(eqNumber), inc, double), Gen.option(Gen.int(0, 9)));
 * ```
 *
 * @module
 */

export type { Law, LawSet } from "./types.js";
export { defineLaw, combineLaws, contramapLaws } from "./types.js";
export { functorLaws } from "./functor.js";
export { traverseLaws } from "./traverse.js";
export { comonadLaws } from "./comonad.js";

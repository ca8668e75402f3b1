/**
 * @strata/fp — typeclasses and data types for recursion schemes
 *
 * Features:
 * - Higher-kinded types through type-level functions (`$<F, A>`)
 * - Typeclass dictionaries (Functor, Foldable, Traverse, Applicative, Monad, Comonad)
 * - Eq, Show, Semigroup and Monoid
 * - Data types: Option, Either, Id, Env/EnvT, State
 * - Law sets for property testing
 *
 * @example
 * ```typescript
 * import { arrayTraverse, optionMonad } from "@strata/fp";
 *
 * arrayTraverse.traverse(optionMonad)([1, 2, 3], (n) => (n > 1 ? n : null));
 * // → null
 * ```
 */

// ============================================================================
// HKT Foundation
// ============================================================================

export type {
  $,
  Kind,
  TypeFunction,
  ArrayF,
  ConstF,
  IdF,
  OptionF,
  EitherF,
  EnvF,
  EnvTF,
  StateF,
} from "./hkt.js";

// ============================================================================
// Typeclasses
// ============================================================================

export * as TC from "./typeclasses/index.js";
export type {
  Functor,
  Apply,
  Applicative,
  FlatMap,
  Monad,
  CoflatMap,
  Comonad,
  Foldable,
  Traverse,
  Semigroup,
  Monoid,
  Eq,
  Show,
} from "./typeclasses/index.js";

// Frequently used derived operations
export { map2 } from "./typeclasses/applicative.js";
export { flatten, makeMonad } from "./typeclasses/monad.js";
export { duplicate } from "./typeclasses/comonad.js";
export { foldMap, toArray, size, isEmpty } from "./typeclasses/foldable.js";
export { void_ } from "./typeclasses/functor.js";
export { sequence } from "./typeclasses/traverse.js";
export {
  makeMonoid,
  monoidString,
  monoidSum,
  monoidAll,
  monoidAny,
  monoidArray,
} from "./typeclasses/semigroup.js";
export { eqStrict, eqTuple, eqArray, eqString, eqNumber } from "./typeclasses/eq.js";
export { showString, showNumber, makeShow } from "./typeclasses/show.js";

// ============================================================================
// Data Types
// ============================================================================

export * from "./data/index.js";

// ============================================================================
// Instances
// ============================================================================

export {
  idMonad,
  idComonad,
  idTraverse,
  optionMonad,
  optionTraverse,
  eitherMonad,
  stateMonad,
  arrayTraverse,
  constApplicative,
  envComonad,
  envTComonad,
} from "./instances.js";

// ============================================================================
// Laws
// ============================================================================

export * from "./laws/index.js";

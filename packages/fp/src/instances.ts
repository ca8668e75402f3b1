/**
 * Typeclass Instances
 *
 * Concrete dictionaries for the data types in this package. Instances are
 * typed against the type-level functions from `hkt.ts`, so
 * `optionMonad.map` has the signature `<A, B>(fa: Option<A>, f: (a: A) => B) => Option<B>`.
 *
 * @example
 * ```typescript
 * import { optionMonad, arrayTraverse } from "./instances.js";
 *
 * arrayTraverse.traverse(optionMonad)([1, 2, 3], (n) => (n > 0 ? n : null));
 * // → [1, 2, 3]
 * ```
 */

import type { ArrayF, ConstF, EitherF, EnvF, EnvTF, IdF, OptionF, StateF, TypeFunction } from "./hkt.js";
import type { $ } from "./hkt.js";
import type { Applicative } from "./typeclasses/applicative.js";
import type { Comonad } from "./typeclasses/comonad.js";
import type { Monad } from "./typeclasses/monad.js";
import { makeMonad } from "./typeclasses/monad.js";
import type { Monoid } from "./typeclasses/semigroup.js";
import type { Traverse } from "./typeclasses/traverse.js";

import type { Either } from "./data/either.js";
import { Right, isLeft } from "./data/either.js";
import type { Env, EnvT } from "./data/env.js";
import type { State } from "./data/state.js";
import * as StateOps from "./data/state.js";

// ============================================================================
// Id
// ============================================================================

/**
 * Monad instance for Id
 */
export const idMonad: Monad<IdF> = {
  pure: (a) => a,
  map: (fa, f) => f(fa),
  flatMap: (fa, f) => f(fa),
  ap: (fab, fa) => fab(fa),
};

/**
 * Comonad instance for Id
 */
export const idComonad: Comonad<IdF> = {
  map: (fa, f) => f(fa),
  extract: (fa) => fa,
  coflatMap: (fa, f) => f(fa),
};

/**
 * Traverse instance for Id (a single element)
 */
export const idTraverse: Traverse<IdF> = {
  map: (fa, f) => f(fa),
  foldLeft: (fa, b, f) => f(b, fa),
  foldRight: (fa, b, f) => f(fa, b),
  traverse:
    <G extends TypeFunction>(_G: Applicative<G>) =>
    <A, B>(fa: A, f: (a: A) => $<G, B>): $<G, B> =>
      f(fa),
};

// ============================================================================
// Option
// ============================================================================

/**
 * Monad instance for Option
 */
export const optionMonad: Monad<OptionF> = {
  pure: (a) => a,
  map: (fa, f) => (fa !== null ? f(fa) : null),
  flatMap: (fa, f) => (fa !== null ? f(fa) : null),
  ap: (fab, fa) => (fab !== null && fa !== null ? fab(fa) : null),
};

/**
 * Traverse instance for Option
 */
export const optionTraverse: Traverse<OptionF> = {
  map: optionMonad.map,
  foldLeft: (fa, b, f) => (fa !== null ? f(b, fa) : b),
  foldRight: (fa, b, f) => (fa !== null ? f(fa, b) : b),
  traverse:
    <G extends TypeFunction>(G: Applicative<G>) =>
    <A, B>(fa: A | null, f: (a: A) => $<G, B>): $<G, B | null> =>
      fa !== null ? G.map(f(fa), (b: B): B | null => b) : G.pure<B | null>(null),
};

// ============================================================================
// Either
// ============================================================================

/**
 * Monad instance for Either with a fixed Left type
 */
export function eitherMonad<E>(): Monad<EitherF<E>> {
  return makeMonad<EitherF<E>>(
    <A>(a: A): Either<E, A> => Right(a),
    <A, B>(fa: Either<E, A>, f: (a: A) => Either<E, B>): Either<E, B> => (isLeft(fa) ? fa : f(fa.right)),
  );
}

// ============================================================================
// State
// ============================================================================

/**
 * Monad instance for State with a fixed state type
 */
export function stateMonad<S>(): Monad<StateF<S>> {
  return makeMonad<StateF<S>>(
    <A>(a: A): State<S, A> => StateOps.pure(a),
    <A, B>(fa: State<S, A>, f: (a: A) => State<S, B>): State<S, B> => StateOps.flatMap(fa, f),
  );
}

// ============================================================================
// Array
// ============================================================================

/**
 * Traverse instance for Array; effects run left to right
 */
export const arrayTraverse: Traverse<ArrayF> = {
  map: (fa, f) => fa.map((a) => f(a)),
  foldLeft: (fa, b, f) => fa.reduce((acc, a) => f(acc, a), b),
  foldRight: (fa, b, f) => fa.reduceRight((acc, a) => f(a, acc), b),
  traverse:
    <G extends TypeFunction>(G: Applicative<G>) =>
    <A, B>(fa: A[], f: (a: A) => $<G, B>): $<G, B[]> =>
      fa.reduce(
        (acc: $<G, B[]>, a: A) =>
          G.ap(
            G.map(acc, (bs: B[]) => (b: B) => [...bs, b]),
            f(a),
          ),
        G.pure<B[]>([]),
      ),
};

// ============================================================================
// Const
// ============================================================================

/**
 * Applicative for the constant functor: `ap` combines with the monoid and
 * `pure` is its identity
 */
export function constApplicative<C>(M: Monoid<C>): Applicative<ConstF<C>> {
  return {
    pure: () => M.empty,
    map: (fa) => fa,
    ap: (fab, fa) => M.combine(fab, fa),
  };
}

// ============================================================================
// Env / EnvT
// ============================================================================

/**
 * Comonad instance for Env with a fixed environment type
 */
export function envComonad<E>(): Comonad<EnvF<E>> {
  return {
    map: <A, B>(fa: Env<E, A>, f: (a: A) => B): Env<E, B> => [fa[0], f(fa[1])],
    extract: <A>(fa: Env<E, A>): A => fa[1],
    coflatMap: <A, B>(fa: Env<E, A>, f: (wa: Env<E, A>) => B): Env<E, B> => [fa[0], f(fa)],
  };
}

/**
 * Comonad instance for EnvT over another comonad `W`
 */
export function envTComonad<E, W extends TypeFunction>(W: Comonad<W>): Comonad<EnvTF<E, W>> {
  return {
    map: <A, B>(fa: EnvT<E, W, A>, f: (a: A) => B): EnvT<E, W, B> => [fa[0], W.map<A, B>(fa[1], f)],
    extract: <A>(fa: EnvT<E, W, A>): A => W.extract<A>(fa[1]),
    coflatMap: <A, B>(fa: EnvT<E, W, A>, f: (wa: EnvT<E, W, A>) => B): EnvT<E, W, B> => [
      fa[0],
      W.coflatMap<A, B>(fa[1], (wa) => f([fa[0], wa])),
    ],
  };
}

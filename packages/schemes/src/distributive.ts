/**
 * Distributive laws
 *
 * A distributive law swaps two layers of context: `F[G[A]] → G[F[A]]`.
 * The generalized folds take one that pushes the comonad `W` out of a
 * shape layer; the generalized unfolds take one that pushes a shape layer
 * out of the monad `M`.
 *
 * A law must be coherent with the (co)monad it serves; see
 * `distributiveLaws` for the checks.
 */

import { isLeft, Left, Right } from "@strata/fp";
import type { $, Either, EitherF, Env, EnvF, EnvT, EnvTF, Functor, IdF, TypeFunction } from "@strata/fp";
import type { Algebra, Coalgebra } from "./algebra.js";
import { unfoldCofree } from "./cofree.js";
import type { Cofree, CofreeF } from "./cofree.js";
import { roll, pure } from "./free.js";
import type { Free, FreeF } from "./free.js";
import type { Corecursive, Recursive } from "./recursive.js";

export type DistributiveLaw<F extends TypeFunction, G extends TypeFunction> = <A>(fga: $<F, $<G, A>>) => $<G, $<F, A>>;

/**
 * The law that swaps a layer with itself.
 */
export function distIdentity<F extends TypeFunction>(): DistributiveLaw<F, F> {
  return <A>(ffa: $<F, $<F, A>>): $<F, $<F, A>> => ffa;
}

// ============================================================================
// Fold side
// ============================================================================

/**
 * No context: `gcata` with this law is `cata`.
 */
export function distCata<F extends TypeFunction>(): DistributiveLaw<F, IdF> {
  return <A>(fa: $<F, A>): $<F, A> => fa;
}

/**
 * Pair each result with a helper algebra's result.
 */
export function distZygo<F extends TypeFunction, B>(F: Functor<F>, g: Algebra<F, B>): DistributiveLaw<F, EnvF<B>> {
  return <A>(fba: $<F, Env<B, A>>): Env<B, $<F, A>> => [
    g(F.map(fba, (p: Env<B, A>) => p[0])),
    F.map(fba, (p: Env<B, A>) => p[1]),
  ];
}

/**
 * Pair each result with the subterm it came from.
 */
export function distPara<T, F extends TypeFunction>(C: Corecursive<T, F>): DistributiveLaw<F, EnvF<T>> {
  return distZygo(C.shape, C.embed);
}

/**
 * `distZygo` on top of another law.
 */
export function distZygoT<F extends TypeFunction, W extends TypeFunction, B>(
  F: Functor<F>,
  g: Algebra<F, B>,
  k: DistributiveLaw<F, W>,
): DistributiveLaw<F, EnvTF<B, W>> {
  return <A>(fe: $<F, EnvT<B, W, A>>): EnvT<B, W, $<F, A>> => [
    g(F.map(fe, (x: EnvT<B, W, A>) => x[0])),
    k<A>(F.map(fe, (x: EnvT<B, W, A>) => x[1])),
  ];
}

/**
 * Keep the full history of results as a cofree structure over `H`.
 */
export function distGHisto<F extends TypeFunction, H extends TypeFunction>(
  F: Functor<F>,
  H: Functor<H>,
  k: DistributiveLaw<F, H>,
): DistributiveLaw<F, CofreeF<H>> {
  return <A>(m: $<F, Cofree<H, A>>): Cofree<H, $<F, A>> =>
    unfoldCofree(H)<$<F, Cofree<H, A>>, $<F, A>>(m, (as) => [
      F.map(as, (c: Cofree<H, A>) => c.head),
      k<Cofree<H, A>>(F.map(as, (c: Cofree<H, A>) => c.tail)),
    ]);
}

export function distHisto<F extends TypeFunction>(F: Functor<F>): DistributiveLaw<F, CofreeF<F>> {
  return distGHisto(F, F, distIdentity<F>());
}

// ============================================================================
// Unfold side
// ============================================================================

/**
 * No effect: `gana` with this law is `ana`.
 */
export function distAna<F extends TypeFunction>(): DistributiveLaw<IdF, F> {
  return <A>(fa: $<F, A>): $<F, A> => fa;
}

/**
 * A `Left` is a finished subterm to unroll; a `Right` is a layer of seeds.
 */
export function distApo<T, F extends TypeFunction>(R: Recursive<T, F>): DistributiveLaw<EitherF<T>, F> {
  return distGApo(R.shape, R.project);
}

/**
 * A `Left` continues with a helper coalgebra.
 */
export function distGApo<F extends TypeFunction, B>(F: Functor<F>, g: Coalgebra<F, B>): DistributiveLaw<EitherF<B>, F> {
  return <A>(e: Either<B, $<F, A>>): $<F, Either<B, A>> =>
    isLeft(e)
      ? F.map(g(e.left), (b: B) => Left<B, A>(b))
      : F.map(e.right, (a: A) => Right<B, A>(a));
}

/**
 * Unroll a partial term one layer at a time, threading it through `k`.
 */
export function distGFutu<F extends TypeFunction, H extends TypeFunction>(
  F: Functor<F>,
  H: Functor<H>,
  k: DistributiveLaw<H, F>,
): DistributiveLaw<FreeF<H>, F> {
  const go = <A>(fr: Free<H, $<F, A>>): $<F, Free<H, A>> =>
    fr._tag === "Pure"
      ? F.map(fr.value, (a: A) => pure<H, A>(a))
      : F.map(
          k<Free<H, A>>(H.map(fr.layer, (x: Free<H, $<F, A>>) => go<A>(x))),
          (layer: $<H, Free<H, A>>) => roll<H, A>(layer),
        );
  return go;
}

export function distFutu<F extends TypeFunction>(F: Functor<F>): DistributiveLaw<FreeF<F>, F> {
  return distGFutu(F, F, distIdentity<F>());
}

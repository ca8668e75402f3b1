/**
 * Generalized folds and unfolds
 *
 * `gcata` threads a comonadic context `W` through a fold; the distributive
 * law decides what that context holds. With the identity law it is `cata`,
 * with `distPara` it is `para`, with `distZygo` it is `zygo`, and with
 * `distHisto` it is `histo`. `gana` is the dual for unfolds over a monad
 * `M`, and `ghylo` fuses the two.
 */

import { duplicate, envComonad, envTComonad, flatten } from "@strata/fp";
import type { $, Comonad, Env, EnvTF, Functor, Monad, TypeFunction } from "@strata/fp";
import type { Algebra, GAlgebra, GCoalgebra } from "./algebra.js";
import { cofreeComonad } from "./cofree.js";
import type { Cofree } from "./cofree.js";
import { distGHisto, distZygo, distZygoT } from "./distributive.js";
import type { DistributiveLaw } from "./distributive.js";
import type { Birecursive, Corecursive, Recursive } from "./recursive.js";

// ============================================================================
// Generalized schemes
// ============================================================================

/**
 * Generalized catamorphism.
 */
export function gcata<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <W extends TypeFunction>(
  W: Comonad<W>,
) => <A>(t: T, k: DistributiveLaw<F, W>, g: GAlgebra<W, F, A>) => A {
  const F = R.shape;
  return <W extends TypeFunction>(W: Comonad<W>) => {
    const dup = duplicate(W);
    return <A>(t: T, k: DistributiveLaw<F, W>, g: GAlgebra<W, F, A>): A => {
      const go = (x: T): $<W, $<F, $<W, A>>> =>
        k<$<W, A>>(F.map(R.project(x), (c: T) => dup<A>(W.map<$<F, $<W, A>>, A>(go(c), g))));
      return g(W.extract<$<F, $<W, A>>>(go(t)));
    };
  };
}

/**
 * Generalized anamorphism.
 */
export function gana<T, F extends TypeFunction>(
  C: Corecursive<T, F>,
): <M extends TypeFunction>(
  M: Monad<M>,
) => <A>(a: A, k: DistributiveLaw<M, F>, f: GCoalgebra<M, F, A>) => T {
  const F = C.shape;
  return <M extends TypeFunction>(M: Monad<M>) => {
    const join = flatten(M);
    return <A>(a: A, k: DistributiveLaw<M, F>, f: GCoalgebra<M, F, A>): T => {
      const go = (x: $<M, $<F, $<M, A>>>): T =>
        C.embed(F.map(k<$<M, A>>(x), (mma: $<M, $<M, A>>) => go(M.map<A, $<F, $<M, A>>>(join<A>(mma), f))));
      return go(M.pure(f(a)));
    };
  };
}

/**
 * Generalized hylomorphism: `gana` then `gcata`, fused.
 */
export function ghylo<F extends TypeFunction>(
  F: Functor<F>,
): <W extends TypeFunction, M extends TypeFunction>(
  W: Comonad<W>,
  M: Monad<M>,
) => <A, B>(
  a: A,
  w: DistributiveLaw<F, W>,
  m: DistributiveLaw<M, F>,
  g: GAlgebra<W, F, B>,
  f: GCoalgebra<M, F, A>,
) => B {
  return <W extends TypeFunction, M extends TypeFunction>(W: Comonad<W>, M: Monad<M>) => {
    const dup = duplicate(W);
    const join = flatten(M);
    return <A, B>(
      a: A,
      w: DistributiveLaw<F, W>,
      m: DistributiveLaw<M, F>,
      g: GAlgebra<W, F, B>,
      f: GCoalgebra<M, F, A>,
    ): B => {
      const go = (x: $<M, A>): $<W, B> =>
        W.map<$<F, $<W, B>>, B>(
          w<$<W, B>>(F.map(m<$<M, A>>(M.map<A, $<F, $<M, A>>>(x, f)), (y: $<M, $<M, A>>) => dup<B>(go(join<A>(y))))),
          g,
        );
      return W.extract<B>(go(M.pure(a)));
    };
  };
}

// ============================================================================
// Schemes derived from gcata
// ============================================================================

/**
 * Zygomorphism: a helper fold `f` runs alongside and its result is visible
 * to the main algebra beside each child's result.
 */
export function zygo<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <A, B>(t: T, f: Algebra<F, B>, g: (fba: $<F, Env<B, A>>) => A) => A {
  return <A, B>(t: T, f: Algebra<F, B>, g: (fba: $<F, Env<B, A>>) => A): A =>
    gcata(R)(envComonad<B>())<A>(t, distZygo(R.shape, f), g);
}

/**
 * `zygo` over another law `w`.
 */
export function gzygo<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <W extends TypeFunction>(
  W: Comonad<W>,
) => <A, B>(t: T, f: Algebra<F, B>, w: DistributiveLaw<F, W>, g: GAlgebra<EnvTF<B, W>, F, A>) => A {
  return <W extends TypeFunction>(W: Comonad<W>) =>
    <A, B>(t: T, f: Algebra<F, B>, w: DistributiveLaw<F, W>, g: GAlgebra<EnvTF<B, W>, F, A>): A =>
      gcata(R)(envTComonad<B, W>(W))<A>(t, distZygoT(R.shape, f, w), g);
}

/**
 * `para` over another law `w`.
 */
export function gpara<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
): <W extends TypeFunction>(
  W: Comonad<W>,
) => <A>(t: T, w: DistributiveLaw<F, W>, g: GAlgebra<EnvTF<T, W>, F, A>) => A {
  return <W extends TypeFunction>(W: Comonad<W>) =>
    <A>(t: T, w: DistributiveLaw<F, W>, g: GAlgebra<EnvTF<T, W>, F, A>): A =>
      gzygo(B)(W)<A, T>(t, B.embed, w, g);
}

/**
 * `histo` where the history is a cofree structure over `H`.
 */
export function ghisto<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <H extends TypeFunction>(
  H: Functor<H>,
) => <A>(t: T, k: DistributiveLaw<F, H>, g: (fc: $<F, Cofree<H, A>>) => A) => A {
  return <H extends TypeFunction>(H: Functor<H>) =>
    <A>(t: T, k: DistributiveLaw<F, H>, g: (fc: $<F, Cofree<H, A>>) => A): A =>
      gcata(R)(cofreeComonad(H))<A>(t, distGHisto(R.shape, H, k), g);
}

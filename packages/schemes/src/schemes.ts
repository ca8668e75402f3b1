/**
 * Recursion schemes
 *
 * Folds consume a term bottom-up, one layer at a time; unfolds grow a term
 * top-down from a seed. Every scheme recurses on the call stack, so depth is
 * bounded by the depth of the term.
 *
 * @example
 * ```typescript
 * const exp = fix(ExpShape);
 * const evaluate: Algebra<ExpF, number> = (e) =>
 *   e._tag === "Num" ? e.value : e._tag === "Mul" ? e.left * e.right : 1;
 *
 * cata(exp)(mul(num(2), num(3)), evaluate); // → 6
 * ```
 */

import { isLeft } from "@strata/fp";
import type { $, Either, Functor, TypeFunction } from "@strata/fp";
import type { Algebra, Coalgebra } from "./algebra.js";
import { attributeAlgebra } from "./cofree.js";
import type { Cofree } from "./cofree.js";
import type { Free } from "./free.js";
import type { Birecursive, Corecursive, Recursive } from "./recursive.js";
import type { Unzip } from "./shape.js";

// ============================================================================
// Folds
// ============================================================================

/**
 * Catamorphism: fold a term bottom-up with an algebra.
 */
export function cata<T, F extends TypeFunction>(R: Recursive<T, F>): <A>(t: T, alg: Algebra<F, A>) => A {
  const F = R.shape;
  return <A>(t: T, alg: Algebra<F, A>): A => {
    const go = (x: T): A => alg(F.map<T, A>(R.project(x), go));
    return go(t);
  };
}

/**
 * Paramorphism: like `cata`, but the algebra also sees each child's
 * original subterm.
 */
export function para<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <A>(t: T, f: (ft: $<F, readonly [T, A]>) => A) => A {
  const F = R.shape;
  return <A>(t: T, f: (ft: $<F, readonly [T, A]>) => A): A => {
    const go = (x: T): A => f(F.map(R.project(x), (c: T): readonly [T, A] => [c, go(c)]));
    return go(t);
  };
}

/**
 * Para and zygo at once: `f` computes a helper from the original subterms,
 * `g` sees the helper beside each child's result.
 */
export function paraZygo<T, F extends TypeFunction>(
  R: Recursive<T, F>,
  U: Unzip<F>,
): <A, B>(t: T, f: (ftb: $<F, readonly [T, B]>) => B, g: (fba: $<F, readonly [B, A]>) => A) => A {
  const F = R.shape;
  return <A, B>(t: T, f: (ftb: $<F, readonly [T, B]>) => B, g: (fba: $<F, readonly [B, A]>) => A): A => {
    const go = (x: T): readonly [B, A] => {
      const [ftb, fba] = U.unzip<readonly [T, B], readonly [B, A]>(
        F.map(R.project(x), (c: T): readonly [readonly [T, B], readonly [B, A]] => {
          const [b, a] = go(c);
          return [
            [c, b],
            [b, a],
          ];
        }),
      );
      return [f(ftb), g(fba)];
    };
    return go(t)[1];
  };
}

/**
 * Histomorphism: the algebra sees every child's result together with the
 * results for that child's whole subtree.
 */
export function histo<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <A>(t: T, f: (fc: $<F, Cofree<F, A>>) => A) => A {
  const F = R.shape;
  return <A>(t: T, f: (fc: $<F, Cofree<F, A>>) => A): A => {
    const go = (x: T): Cofree<F, A> => {
      const tail = F.map<T, Cofree<F, A>>(R.project(x), go);
      return { head: f(tail), tail };
    };
    return go(t).head;
  };
}

// ============================================================================
// Unfolds
// ============================================================================

/**
 * Anamorphism: grow a term top-down from a seed.
 */
export function ana<T, F extends TypeFunction>(C: Corecursive<T, F>): <A>(a: A, coalg: Coalgebra<F, A>) => T {
  const F = C.shape;
  return <A>(a: A, coalg: Coalgebra<F, A>): T => {
    const go = (x: A): T => C.embed(F.map<A, T>(coalg(x), go));
    return go(a);
  };
}

/**
 * Apomorphism: like `ana`, but a child may be a finished term (`Left`)
 * instead of a seed (`Right`).
 */
export function apo<T, F extends TypeFunction>(
  C: Corecursive<T, F>,
): <A>(a: A, f: (a: A) => $<F, Either<T, A>>) => T {
  const F = C.shape;
  return <A>(a: A, f: (a: A) => $<F, Either<T, A>>): T => {
    const go = (x: A): T => C.embed(F.map(f(x), (e: Either<T, A>): T => (isLeft(e) ? e.left : go(e.right))));
    return go(a);
  };
}

/**
 * Futumorphism: each step may emit several layers at once, stopping at
 * `Pure` seeds that are unfolded further.
 */
export function futu<T, F extends TypeFunction>(
  C: Corecursive<T, F>,
): <A>(a: A, f: (a: A) => $<F, Free<F, A>>) => T {
  const F = C.shape;
  return <A>(a: A, f: (a: A) => $<F, Free<F, A>>): T => {
    const go = (x: A): T => C.embed(F.map(f(x), step));
    const step = (fr: Free<F, A>): T =>
      fr._tag === "Pure" ? go(fr.value) : C.embed(F.map<Free<F, A>, T>(fr.layer, step));
    return go(a);
  };
}

// ============================================================================
// Refolds
// ============================================================================

/**
 * Hylomorphism: `ana` then `cata`, without building the intermediate term.
 */
export function hylo<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(a: A, alg: Algebra<F, B>, coalg: Coalgebra<F, A>) => B {
  return <A, B>(a: A, alg: Algebra<F, B>, coalg: Coalgebra<F, A>): B => {
    const go = (x: A): B => alg(F.map<A, B>(coalg(x), go));
    return go(a);
  };
}

/**
 * Chronomorphism: `futu` then `histo`, without building the intermediate
 * term.
 */
export function chrono<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(a: A, g: (fc: $<F, Cofree<F, B>>) => B, f: (a: A) => $<F, Free<F, A>>) => B {
  return <A, B>(a: A, g: (fc: $<F, Cofree<F, B>>) => B, f: (a: A) => $<F, Free<F, A>>): B => {
    const build = (layer: $<F, Cofree<F, B>>): Cofree<F, B> => ({ head: g(layer), tail: layer });
    const go = (x: A): Cofree<F, B> => build(F.map(f(x), step));
    const step = (fr: Free<F, A>): Cofree<F, B> =>
      fr._tag === "Pure" ? go(fr.value) : build(F.map<Free<F, A>, Cofree<F, B>>(fr.layer, step));
    return go(a).head;
  };
}

// ============================================================================
// Conversions and rewrites
// ============================================================================

/**
 * Re-encode a term, e.g. from `Fix` to `Mu`.
 */
export function convertTo<T, U, F extends TypeFunction>(R: Recursive<T, F>, C: Corecursive<U, F>): (t: T) => U {
  return (t) => cata(R)(t, C.embed);
}

/**
 * Attribute a term bottom-up with an algebra's result at each node.
 */
export function annotate<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <A>(t: T, alg: Algebra<F, A>) => Cofree<F, A> {
  return <A>(t: T, alg: Algebra<F, A>): Cofree<F, A> => cata(R)(t, attributeAlgebra(R.shape)<A>(alg));
}

/**
 * Rewrite every layer bottom-up; `f` sees children that are already
 * rewritten.
 */
export function transCata<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
): (t: T, f: (ft: $<F, T>) => $<F, T>) => T {
  return (t, f) => cata(B)(t, (ft: $<F, T>) => B.embed(f(ft)));
}

/**
 * Rewrite every layer top-down; the children of the rewritten layer are
 * rewritten next.
 */
export function transAna<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
): (t: T, f: (ft: $<F, T>) => $<F, T>) => T {
  return (t, f) => ana(B)(t, (x: T) => f(B.project(x)));
}

/**
 * Whole-term queries
 *
 * Everything here is one pre-order accumulation, `foldMapM`: a node is
 * visited before its children, and children left to right. `any`, `all`
 * and `find` stop at the first decisive node by failing the accumulation
 * through an Either.
 */

import {
  Left,
  Right,
  eitherMonad,
  idMonad,
  isEmpty,
  isLeft,
  makeMonoid,
  monoidArray,
  toArray,
} from "@strata/fp";
import type { $, Either, Eq, Monad, Monoid, Option, TypeFunction } from "@strata/fp";
import type { Recursive } from "./recursive.js";

const unitMonoid: Monoid<void> = makeMonoid<void>(() => undefined, undefined);

/**
 * The immediate subterms of a term, left to right.
 */
export function children<T, F extends TypeFunction>(R: Recursive<T, F>): (t: T) => T[] {
  const list = toArray(R.shape);
  return (t) => list<T>(R.project(t));
}

export function isLeaf<T, F extends TypeFunction>(R: Recursive<T, F>): (t: T) => boolean {
  const empty = isEmpty(R.shape);
  return (t) => empty<T>(R.project(t));
}

/**
 * Pre-order monadic accumulation over every subterm.
 */
export function foldMapM<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <M extends TypeFunction, Z>(M: Monad<M>, Z: Monoid<Z>) => (t: T, f: (t: T) => $<M, Z>) => $<M, Z> {
  return <M extends TypeFunction, Z>(M: Monad<M>, Z: Monoid<Z>) =>
    (t: T, f: (t: T) => $<M, Z>): $<M, Z> => {
      const go = (acc: Z, x: T): $<M, Z> =>
        M.flatMap<Z, Z>(f(x), (z: Z) =>
          R.shape.foldLeft<T, $<M, Z>>(R.project(x), M.pure(Z.combine(acc, z)), (mz: $<M, Z>, c: T) =>
            M.flatMap<Z, Z>(mz, (next: Z) => go(next, c)),
          ),
        );
      return go(Z.empty, t);
    };
}

export function foldMap<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <Z>(Z: Monoid<Z>) => (t: T, f: (t: T) => Z) => Z {
  return <Z>(Z: Monoid<Z>) =>
    (t: T, f: (t: T) => Z): Z =>
      foldMapM(R)(idMonad, Z)(t, f);
}

/**
 * Every subterm in pre-order, starting with the term itself.
 */
export function universe<T, F extends TypeFunction>(R: Recursive<T, F>): (t: T) => readonly T[] {
  return (t) => foldMap(R)(monoidArray<T>())(t, (x) => [x]);
}

/**
 * The first subterm in pre-order satisfying `p`.
 */
export function find<T, F extends TypeFunction>(R: Recursive<T, F>): (t: T, p: (t: T) => boolean) => Option<T> {
  return (t, p) => {
    const result: Either<T, void> = foldMapM(R)(eitherMonad<T>(), unitMonoid)(t, (x: T) =>
      p(x) ? Left<T, void>(x) : Right<T, void>(undefined),
    );
    return isLeft(result) ? result.left : null;
  };
}

export function any<T, F extends TypeFunction>(R: Recursive<T, F>): (t: T, p: (t: T) => boolean) => boolean {
  return (t, p) => find(R)(t, p) !== null;
}

export function all<T, F extends TypeFunction>(R: Recursive<T, F>): (t: T, p: (t: T) => boolean) => boolean {
  return (t, p) => find(R)(t, (x) => !p(x)) === null;
}

/**
 * Results of a partial function over every subterm where it is defined.
 */
export function collect<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <B>(t: T, pf: (t: T) => Option<B>) => readonly B[] {
  return <B>(t: T, pf: (t: T) => Option<B>): readonly B[] =>
    foldMap(R)(monoidArray<B>())(t, (x: T): readonly B[] => {
      const b = pf(x);
      return b === null ? [] : [b];
    });
}

export function contains<T, F extends TypeFunction>(R: Recursive<T, F>, E: Eq<T>): (t: T, c: T) => boolean {
  return (t, c) => any(R)(t, (x) => E.eqv(x, c));
}

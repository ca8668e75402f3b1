/**
 * Monadic schemes
 *
 * Each node's children are sequenced left to right through the effect `M`.
 * Sequencing goes through a deferred applicative, so when `M` fails (an
 * Option returning `null`, an Either returning `Left`) no later sibling,
 * and no ancestor, is evaluated.
 *
 * @example
 * ```typescript
 * const safeDiv: AlgebraM<OptionF, ExpF, number> = ...;
 * cataM(exp)(optionMonad)(term, safeDiv); // → null on the first failure
 * ```
 */

import { idMonad, isLeft } from "@strata/fp";
import type { $, Applicative, Either, Monad, Traverse, TypeFunction } from "@strata/fp";
import type { AlgebraM, CoalgebraM } from "./algebra.js";
import type { Birecursive, Corecursive, Recursive } from "./recursive.js";

// ============================================================================
// Deferred sequencing
// ============================================================================

/**
 * An `M` computation that has not been started yet.
 */
interface DeferF<M extends TypeFunction> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: () => $<M, this["__kind__"]>;
}

function deferApplicative<M extends TypeFunction>(M: Monad<M>): Applicative<DeferF<M>> {
  return {
    pure:
      <A>(a: A) =>
      (): $<M, A> =>
        M.pure(a),
    map:
      <A, B>(fa: () => $<M, A>, f: (a: A) => B) =>
      (): $<M, B> =>
        M.map<A, B>(fa(), f),
    ap:
      <A, B>(ff: () => $<M, (a: A) => B>, fa: () => $<M, A>) =>
      (): $<M, B> =>
        M.flatMap<(a: A) => B, B>(ff(), (f) => M.map<A, B>(fa(), f)),
  };
}

/**
 * Traverse one layer, starting each child's effect only after the previous
 * sibling's succeeded.
 */
export function traverseM<F extends TypeFunction, M extends TypeFunction>(
  F: Traverse<F>,
  M: Monad<M>,
): <A, B>(fa: $<F, A>, f: (a: A) => $<M, B>) => $<M, $<F, B>> {
  const D = deferApplicative(M);
  return <A, B>(fa: $<F, A>, f: (a: A) => $<M, B>): $<M, $<F, B>> => {
    const deferred: () => $<M, $<F, B>> = F.traverse(D)<A, B>(fa, (a: A) => () => f(a));
    return deferred();
  };
}

// ============================================================================
// Folds and unfolds
// ============================================================================

export function cataM<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <M extends TypeFunction>(M: Monad<M>) => <A>(t: T, f: AlgebraM<M, F, A>) => $<M, A> {
  return <M extends TypeFunction>(M: Monad<M>) => {
    const sequenced = traverseM(R.shape, M);
    return <A>(t: T, f: AlgebraM<M, F, A>): $<M, A> => {
      const go = (x: T): $<M, A> => M.flatMap<$<F, A>, A>(sequenced<T, A>(R.project(x), go), f);
      return go(t);
    };
  };
}

export function paraM<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <M extends TypeFunction>(M: Monad<M>) => <A>(t: T, f: (ft: $<F, readonly [T, A]>) => $<M, A>) => $<M, A> {
  return <M extends TypeFunction>(M: Monad<M>) => {
    const sequenced = traverseM(R.shape, M);
    return <A>(t: T, f: (ft: $<F, readonly [T, A]>) => $<M, A>): $<M, A> => {
      const go = (x: T): $<M, A> =>
        M.flatMap<$<F, readonly [T, A]>, A>(
          sequenced<T, readonly [T, A]>(R.project(x), (c: T) =>
            M.map<A, readonly [T, A]>(go(c), (a: A): readonly [T, A] => [c, a]),
          ),
          f,
        );
      return go(t);
    };
  };
}

export function anaM<T, F extends TypeFunction>(
  C: Corecursive<T, F>,
): <M extends TypeFunction>(M: Monad<M>) => <A>(a: A, f: CoalgebraM<M, F, A>) => $<M, T> {
  return <M extends TypeFunction>(M: Monad<M>) => {
    const sequenced = traverseM(C.shape, M);
    return <A>(a: A, f: CoalgebraM<M, F, A>): $<M, T> => {
      const go = (x: A): $<M, T> =>
        M.flatMap<$<F, A>, T>(f(x), (fa: $<F, A>) => M.map<$<F, T>, T>(sequenced<A, T>(fa, go), C.embed));
      return go(a);
    };
  };
}

/**
 * Monadic apomorphism: a `Left` child is a finished term.
 */
export function apoM<T, F extends TypeFunction>(
  C: Corecursive<T, F>,
): <M extends TypeFunction>(M: Monad<M>) => <A>(a: A, f: (a: A) => $<M, $<F, Either<T, A>>>) => $<M, T> {
  return <M extends TypeFunction>(M: Monad<M>) => {
    const sequenced = traverseM(C.shape, M);
    return <A>(a: A, f: (a: A) => $<M, $<F, Either<T, A>>>): $<M, T> => {
      const go = (x: A): $<M, T> =>
        M.flatMap<$<F, Either<T, A>>, T>(f(x), (fe: $<F, Either<T, A>>) =>
          M.map<$<F, T>, T>(
            sequenced<Either<T, A>, T>(fe, (e: Either<T, A>) => (isLeft(e) ? M.pure(e.left) : go(e.right))),
            C.embed,
          ),
        );
      return go(a);
    };
  };
}

// ============================================================================
// Top-down rewrites
// ============================================================================

/**
 * Rewrite a term top-down while threading state from each node to its
 * children, e.g. the variable bindings in scope.
 *
 * `f` sees the state and the subterm and returns the state for the
 * children together with the replacement subterm, whose children are
 * visited next.
 */
export function topDownCataM<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
): <M extends TypeFunction>(M: Monad<M>) => <A>(t: T, a: A, f: (a: A, t: T) => $<M, readonly [A, T]>) => $<M, T> {
  return <M extends TypeFunction>(M: Monad<M>) => {
    const sequenced = traverseM(B.shape, M);
    return <A>(t: T, a: A, f: (a: A, t: T) => $<M, readonly [A, T]>): $<M, T> => {
      const go = (state: A, x: T): $<M, T> =>
        M.flatMap<readonly [A, T], T>(f(state, x), ([next, replaced]) =>
          M.map<$<F, T>, T>(
            sequenced<T, T>(B.project(replaced), (c: T) => go(next, c)),
            B.embed,
          ),
        );
      return go(a, t);
    };
  };
}

/**
 * `topDownCataM` without an effect.
 */
export function topDownCata<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
): <A>(t: T, a: A, f: (a: A, t: T) => readonly [A, T]) => T {
  return <A>(t: T, a: A, f: (a: A, t: T) => readonly [A, T]): T => topDownCataM(B)(idMonad)<A>(t, a, f);
}

// ============================================================================
// Effectful rewrites
// ============================================================================

/**
 * Bottom-up layer rewrite through an effect.
 */
export function transCataM<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
): <M extends TypeFunction>(M: Monad<M>) => (t: T, f: (ft: $<F, T>) => $<M, $<F, T>>) => $<M, T> {
  return <M extends TypeFunction>(M: Monad<M>) =>
    (t: T, f: (ft: $<F, T>) => $<M, $<F, T>>): $<M, T> =>
      cataM(B)(M)<T>(t, (ft: $<F, T>) => M.map<$<F, T>, T>(f(ft), B.embed));
}

/**
 * Top-down layer rewrite through an effect.
 */
export function transAnaM<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
): <M extends TypeFunction>(M: Monad<M>) => (t: T, f: (ft: $<F, T>) => $<M, $<F, T>>) => $<M, T> {
  return <M extends TypeFunction>(M: Monad<M>) =>
    (t: T, f: (ft: $<F, T>) => $<M, $<F, T>>): $<M, T> =>
      anaM(B)(M)<T>(t, (x: T) => f(B.project(x)));
}

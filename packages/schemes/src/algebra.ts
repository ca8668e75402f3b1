/**
 * Algebras and coalgebras
 *
 * An algebra collapses one layer whose children are already results; a
 * coalgebra grows one layer whose children are still seeds. The `G` and `M`
 * variants carry a comonadic context or a monadic effect around each child.
 */

import { config, createLogger, StrataError, S1101 } from "@strata/core";
import type { $, Applicative, Comonad, Functor, Option, TypeFunction } from "@strata/fp";

const log = createLogger("rewrite");

// ============================================================================
// Types
// ============================================================================

export type Algebra<F extends TypeFunction, A> = (fa: $<F, A>) => A;
export type Coalgebra<F extends TypeFunction, A> = (a: A) => $<F, A>;

export type AlgebraM<M extends TypeFunction, F extends TypeFunction, A> = (fa: $<F, A>) => $<M, A>;
export type CoalgebraM<M extends TypeFunction, F extends TypeFunction, A> = (a: A) => $<M, $<F, A>>;

/** Algebra whose children arrive wrapped in the comonad `W` */
export type GAlgebra<W extends TypeFunction, F extends TypeFunction, A> = (fwa: $<F, $<W, A>>) => A;
/** Coalgebra whose children leave wrapped in the monad `M` */
export type GCoalgebra<M extends TypeFunction, F extends TypeFunction, A> = (a: A) => $<F, $<M, A>>;

// ============================================================================
// Combinators
// ============================================================================

/**
 * Run two algebras side by side in a single pass.
 *
 * @example
 * ```typescript
 * cata(exp)(term, zipAlgebras(ExpShape)(evaluate, constants));
 * // → [10, [5, 2]]
 * ```
 */
export function zipAlgebras<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(f: Algebra<F, A>, g: Algebra<F, B>) => Algebra<F, readonly [A, B]> {
  return <A, B>(f: Algebra<F, A>, g: Algebra<F, B>) =>
    (fab: $<F, readonly [A, B]>): readonly [A, B] => [
      f(F.map(fab, (p: readonly [A, B]) => p[0])),
      g(F.map(fab, (p: readonly [A, B]) => p[1])),
    ];
}

/**
 * Turn a plain algebra into one for any comonadic context by extracting.
 */
export function generalizeAlgebra<F extends TypeFunction, W extends TypeFunction>(
  F: Functor<F>,
  W: Comonad<W>,
): <A>(f: Algebra<F, A>) => GAlgebra<W, F, A> {
  return <A>(f: Algebra<F, A>) =>
    (fwa: $<F, $<W, A>>): A =>
      f(F.map(fwa, (wa: $<W, A>) => W.extract<A>(wa)));
}

/**
 * Turn a plain coalgebra into one for any monad by wrapping each seed.
 */
export function generalizeCoalgebra<F extends TypeFunction, M extends TypeFunction>(
  F: Functor<F>,
  M: Applicative<M>,
): <A>(f: Coalgebra<F, A>) => GCoalgebra<M, F, A> {
  return <A>(f: Coalgebra<F, A>) =>
    (a: A): $<F, $<M, A>> =>
      F.map(f(a), (x: A) => M.pure(x));
}

// ============================================================================
// Partial rewrites
// ============================================================================

/**
 * Make a partial rewrite total: where it declines, keep the input.
 */
export function once<A>(f: (a: A) => Option<A>): (a: A) => A {
  return (a) => f(a) ?? a;
}

/**
 * Apply a partial rewrite until it declines.
 *
 * @throws StrataError S1101 when no fixpoint is reached within `rewrite.limit` steps
 */
export function repeatedly<A>(f: (a: A) => Option<A>): (a: A) => A {
  return (a) => {
    const limit = config.getNumber("rewrite.limit", 10000);
    let current = a;
    for (let step = 0; ; step++) {
      const next = f(current);
      if (next === null) {
        log.debug(`fixpoint reached after ${step} step(s)`);
        return current;
      }
      // `limit` rewrites have already fired
      if (step === limit) {
        log.error(`rewrite still firing after ${limit} steps`);
        throw new StrataError(S1101, { limit });
      }
      current = next;
    }
  };
}

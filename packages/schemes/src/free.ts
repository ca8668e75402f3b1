/**
 * Free - partial terms
 *
 * A `Free<F, A>` is a term over `F` that may stop early at a `Pure` leaf
 * holding a seed. Futumorphisms emit these to produce several layers from
 * one seed.
 */

import { makeMonad } from "@strata/fp";
import type { $, Functor, Monad, TypeFunction } from "@strata/fp";

// ============================================================================
// Type Definition
// ============================================================================

export interface Pure<A> {
  readonly _tag: "Pure";
  readonly value: A;
}

export interface Roll<F extends TypeFunction, A> {
  readonly _tag: "Roll";
  readonly layer: $<F, Free<F, A>>;
}

export type Free<F extends TypeFunction, A> = Pure<A> | Roll<F, A>;

/**
 * Type-level function for `Free<F, _>`.
 */
export interface FreeF<F extends TypeFunction> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Free<F, this["__kind__"]>;
}

// ============================================================================
// Constructors
// ============================================================================

export function pure<F extends TypeFunction, A>(value: A): Free<F, A> {
  return { _tag: "Pure", value };
}

export function roll<F extends TypeFunction, A>(layer: $<F, Free<F, A>>): Free<F, A> {
  return { _tag: "Roll", layer };
}

/**
 * Lift one layer whose children are seeds.
 */
export function liftF<F extends TypeFunction>(F: Functor<F>): <A>(fa: $<F, A>) => Free<F, A> {
  return <A>(fa: $<F, A>): Free<F, A> => roll<F, A>(F.map(fa, (a: A) => pure<F, A>(a)));
}

// ============================================================================
// Instances
// ============================================================================

/**
 * Monad instance: `flatMap` grafts a partial term onto every leaf.
 */
export function freeMonad<F extends TypeFunction>(F: Functor<F>): Monad<FreeF<F>> {
  const flatMap = <A, B>(fa: Free<F, A>, f: (a: A) => Free<F, B>): Free<F, B> =>
    fa._tag === "Pure" ? f(fa.value) : roll<F, B>(F.map(fa.layer, (x: Free<F, A>) => flatMap(x, f)));
  return makeMonad<FreeF<F>>(<A>(a: A): Free<F, A> => pure<F, A>(a), flatMap);
}

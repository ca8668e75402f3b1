/**
 * Env (the environment comonad) and its transformer EnvT
 *
 * `Env<E, A>` pairs a focused value with a read-only environment: in a
 * paramorphism the environment is the original subterm, in a zygomorphism
 * it is the helper fold's result. `EnvT<E, W, A>` adds the same
 * environment on top of another comonad `W`.
 *
 * Both are plain readonly pairs with the environment first.
 */

import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Types
// ============================================================================

export type Env<E, A> = readonly [E, A];

export type EnvT<E, W extends TypeFunction, A> = readonly [E, $<W, A>];

// ============================================================================
// Operations
// ============================================================================

/**
 * Pair a value with its environment
 */
export function env<E, A>(e: E, a: A): Env<E, A> {
  return [e, a];
}

/**
 * Read the environment
 */
export function ask<E, A>(ea: Env<E, A>): E {
  return ea[0];
}

/**
 * Read the focused value
 */
export function lower<E, A>(ea: Env<E, A>): A {
  return ea[1];
}

/**
 * Change the environment, keeping the focus
 */
export function local<E, E2, A>(ea: Env<E, A>, f: (e: E) => E2): Env<E2, A> {
  return [f(ea[0]), ea[1]];
}

/**
 * CoflatMap and Comonad Typeclasses
 *
 * The dual of FlatMap/Monad: a comonad has a focused value that can be
 * extracted, and can extend a context-consuming function over every
 * position of the structure.
 *
 * Laws:
 *   - Left identity: coflatMap(wa, extract) === wa
 *   - Right identity: extract(coflatMap(wa, f)) === f(wa)
 *   - Associativity: coflatMap(coflatMap(wa, f), g) === coflatMap(wa, x => g(coflatMap(x, f)))
 */

import type { Functor } from "./functor.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// CoflatMap
// ============================================================================

export interface CoflatMap<W extends TypeFunction> extends Functor<W> {
  readonly coflatMap: <A, B>(wa: $<W, A>, f: (wa: $<W, A>) => B) => $<W, B>;
}

// ============================================================================
// Comonad
// ============================================================================

export interface Comonad<W extends TypeFunction> extends CoflatMap<W> {
  readonly extract: <A>(wa: $<W, A>) => A;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Replace every focus with the whole context at that position
 */
export function duplicate<W extends TypeFunction>(W: CoflatMap<W>): <A>(wa: $<W, A>) => $<W, $<W, A>> {
  return <A>(wa: $<W, A>) => W.coflatMap(wa, (x: $<W, A>) => x);
}

/**
 * Traverse Typeclass
 *
 * Traverse extends Functor and Foldable with the ability to traverse
 * a structure while accumulating effects. Effects run left to right.
 *
 * Laws:
 *   - Identity: traverse(F)(fa, G.pure) === G.pure(fa)
 *   - Composition: traverse(F)(fa, Compose(G, H).of . f) === G.map(traverse(F)(fa, f), traverse(F)(_, g))
 *   - Naturality: t(traverse(F)(fa, f)) === traverse(F)(fa, t . f) for any applicative transformation t
 */

import type { Applicative } from "./applicative.js";
import type { Functor } from "./functor.js";
import type { Foldable } from "./foldable.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Traverse
// ============================================================================

/**
 * Traverse typeclass
 */
export interface Traverse<F extends TypeFunction> extends Functor<F>, Foldable<F> {
  readonly traverse: <G extends TypeFunction>(
    G: Applicative<G>,
  ) => <A, B>(fa: $<F, A>, f: (a: A) => $<G, B>) => $<G, $<F, B>>;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Sequence a structure of effects into an effect of structure
 */
export function sequence<F extends TypeFunction>(
  F: Traverse<F>,
): <G extends TypeFunction>(G: Applicative<G>) => <A>(fga: $<F, $<G, A>>) => $<G, $<F, A>> {
  return <G extends TypeFunction>(G: Applicative<G>) =>
    <A>(fga: $<F, $<G, A>>) =>
      F.traverse(G)(fga, (x: $<G, A>) => x);
}

/**
 * Traverse for effects only, discarding the rebuilt structure
 */
export function traverse_<F extends TypeFunction>(
  F: Traverse<F>,
): <G extends TypeFunction>(G: Applicative<G>) => <A, B>(fa: $<F, A>, f: (a: A) => $<G, B>) => $<G, void> {
  return <G extends TypeFunction>(G: Applicative<G>) =>
    <A, B>(fa: $<F, A>, f: (a: A) => $<G, B>) =>
      G.map(F.traverse(G)(fa, f), () => undefined);
}

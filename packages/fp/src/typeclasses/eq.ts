/**
 * Eq Typeclass
 *
 * Type-safe equality. Structural equality of terms is always expressed
 * through an Eq dictionary rather than `===`.
 *
 * Laws:
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) implies eqv(x, z)
 */

// ============================================================================
// Eq
// ============================================================================

/**
 * Eq typeclass - equality comparison
 */
export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

// ============================================================================
// Eq Combinators
// ============================================================================

/**
 * Eq that uses strict equality
 */
export function eqStrict<A>(): Eq<A> {
  return { eqv: (x, y) => x === y };
}

/**
 * Eq for pairs
 */
export function eqTuple<A, B>(EA: Eq<A>, EB: Eq<B>): Eq<readonly [A, B]> {
  return {
    eqv: ([a1, b1], [a2, b2]) => EA.eqv(a1, a2) && EB.eqv(b1, b2),
  };
}

/**
 * Eq for arrays (element-wise)
 */
export function eqArray<A>(E: Eq<A>): Eq<readonly A[]> {
  return {
    eqv: (xs, ys) => xs.length === ys.length && xs.every((x, i) => E.eqv(x, ys[i])),
  };
}

// ============================================================================
// Instances
// ============================================================================

export const eqString: Eq<string> = eqStrict();

export const eqNumber: Eq<number> = eqStrict();

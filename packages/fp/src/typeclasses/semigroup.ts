/**
 * Semigroup and Monoid Typeclasses
 *
 * Semigroup: A type with an associative binary operation.
 * Monoid: A Semigroup with an identity element.
 *
 * Laws:
 *   - Semigroup Associativity: combine(combine(x, y), z) === combine(x, combine(y, z))
 *   - Monoid Left Identity: combine(empty, x) === x
 *   - Monoid Right Identity: combine(x, empty) === x
 */

// ============================================================================
// Semigroup
// ============================================================================

/**
 * Semigroup typeclass
 */
export interface Semigroup<A> {
  readonly combine: (x: A, y: A) => A;
}

// ============================================================================
// Monoid
// ============================================================================

/**
 * Monoid typeclass - Semigroup with identity
 */
export interface Monoid<A> extends Semigroup<A> {
  readonly empty: A;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Create a Monoid from a combine function and an identity
 */
export function makeMonoid<A>(combine: (x: A, y: A) => A, empty: A): Monoid<A> {
  return { combine, empty };
}

// ============================================================================
// Instances
// ============================================================================

/**
 * Monoid for strings (concatenation)
 */
export const monoidString: Monoid<string> = makeMonoid((x, y) => x + y, "");

/**
 * Monoid for numbers under addition
 */
export const monoidSum: Monoid<number> = makeMonoid((x, y) => x + y, 0);

/**
 * Monoid for booleans under conjunction
 */
export const monoidAll: Monoid<boolean> = makeMonoid((x, y) => x && y, true);

/**
 * Monoid for booleans under disjunction
 */
export const monoidAny: Monoid<boolean> = makeMonoid((x, y) => x || y, false);

/**
 * Monoid for arrays (concatenation with empty)
 */
export function monoidArray<A>(): Monoid<readonly A[]> {
  return {
    combine: (x, y) => [...x, ...y],
    empty: [],
  };
}

/**
 * Law Definition Types
 *
 * A law is a named predicate over one generated input. Laws that need
 * several values take a tuple; laws that need functions close over fixed
 * ones supplied when the law set is built.
 *
 * @module
 */

// ============================================================================
// Core Types
// ============================================================================

export interface Law<T> {
  /**
   * Human-readable name of the law.
   * Used in error messages and test descriptions.
   * @example "associativity", "left identity", "functor composition"
   */
  readonly name: string;

  /**
   * The law predicate. Returns true if the law holds for the input.
   */
  readonly check: (input: T) => boolean;

  /**
   * Optional description explaining the law in plain English.
   * Shown in failure reports.
   */
  readonly description?: string;
}

export type LawSet<T> = readonly Law<T>[];

// ============================================================================
// Builder Utilities
// ============================================================================

/**
 * Create a law with type inference for the input.
 */
export function defineLaw<T>(name: string, check: (input: T) => boolean, description?: string): Law<T> {
  return description === undefined ? { name, check } : { name, check, description };
}

/**
 * Concatenate law sets over the same input.
 */
export function combineLaws<T>(...sets: LawSet<T>[]): LawSet<T> {
  return sets.flat();
}

/**
 * Lift laws over `B` to laws over `A` by deriving the input.
 */
export function contramapLaws<A, B>(laws: LawSet<B>, f: (a: A) => B): LawSet<A> {
  return laws.map((law) => ({ ...law, check: (a: A) => law.check(f(a)) }));
}

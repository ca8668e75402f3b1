/**
 * Option Data Type
 *
 * Option<A> represents an optional value: either a value or nothing.
 * The representation is `A | null`: `Some(a)` is `a` itself and `None`
 * is `null`, so no wrapper object is allocated.
 *
 * Because `null` means None, `Option<null>` cannot distinguish
 * `Some(null)` from `None`. Use a different payload type if null must
 * be a valid value.
 */

import type { Either } from "./either.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Show } from "../typeclasses/show.js";

// ============================================================================
// Option Type Definition
// ============================================================================

/**
 * Option type: the value itself, or null
 */
export type Option<A> = A | null;

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create Some(a)
 */
export function Some<A>(value: A): Option<A> {
  return value;
}

/**
 * None (null)
 */
export const None: Option<never> = null;

/**
 * Create an Option from a nullable value
 */
export function fromNullable<A>(value: A | null | undefined): Option<A> {
  return value ?? null;
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if Option is Some (has a value)
 */
export function isSome<A>(opt: Option<A>): opt is A {
  return opt !== null;
}

/**
 * Check if Option is None (is null)
 */
export function isNone<A>(opt: Option<A>): opt is null {
  return opt === null;
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Map over the Option value
 */
export function map<A, B>(opt: Option<A>, f: (a: A) => B): Option<B> {
  return opt !== null ? f(opt) : null;
}

/**
 * FlatMap over the Option value
 */
export function flatMap<A, B>(opt: Option<A>, f: (a: A) => Option<B>): Option<B> {
  return opt !== null ? f(opt) : null;
}

/**
 * Apply a function in Option to a value in Option
 */
export function ap<A, B>(optF: Option<(a: A) => B>, optA: Option<A>): Option<B> {
  return optF !== null && optA !== null ? optF(optA) : null;
}

/**
 * Fold over Option - provide handlers for both cases
 */
export function fold<A, B>(opt: Option<A>, onNone: () => B, onSome: (a: A) => B): B {
  return opt !== null ? onSome(opt) : onNone();
}

/**
 * Get the value or a default
 */
export function getOrElse<A>(opt: Option<A>, defaultValue: () => A): A {
  return opt !== null ? opt : defaultValue();
}

/**
 * Return the first Some, or evaluate the fallback
 */
export function orElse<A>(opt: Option<A>, fallback: () => Option<A>): Option<A> {
  return opt !== null ? opt : fallback();
}

/**
 * Filter the Option value
 */
export function filter<A>(opt: Option<A>, predicate: (a: A) => boolean): Option<A> {
  return opt !== null && predicate(opt) ? opt : null;
}

/**
 * Convert to Either, using `left` for None
 */
export function toEither<E, A>(opt: Option<A>, left: () => E): Either<E, A> {
  return opt !== null ? { _tag: "Right", right: opt } : { _tag: "Left", left: left() };
}

/**
 * Convert to an array of zero or one element
 */
export function toArray<A>(opt: Option<A>): A[] {
  return opt !== null ? [opt] : [];
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Eq instance for Option
 */
export function getEq<A>(E: Eq<A>): Eq<Option<A>> {
  return {
    eqv: (x, y) => {
      if (x === null && y === null) return true;
      if (x !== null && y !== null) return E.eqv(x, y);
      return false;
    },
  };
}

/**
 * Show instance for Option
 */
export function getShow<A>(S: Show<A>): Show<Option<A>> {
  return {
    show: (opt) => (opt !== null ? `Some(${S.show(opt)})` : "None"),
  };
}

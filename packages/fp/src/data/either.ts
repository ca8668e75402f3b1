/**
 * Either Data Type
 *
 * Either represents a value of one of two possible types (a disjoint union).
 * An Either<E, A> is either Left<E> (representing failure/error) or Right<A> (representing success).
 * By convention, Right is the "right" (correct/success) case.
 */

import type { Eq } from "../typeclasses/eq.js";
import type { Show } from "../typeclasses/show.js";

// ============================================================================
// Either Type Definition
// ============================================================================

/**
 * Either data type - either Left (error) or Right (success)
 */
export type Either<E, A> = Left<E> | Right<A>;

/**
 * Left variant - represents failure/error
 */
export interface Left<E> {
  readonly _tag: "Left";
  readonly left: E;
}

/**
 * Right variant - represents success
 */
export interface Right<A> {
  readonly _tag: "Right";
  readonly right: A;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Left value
 */
export function Left<E, A = never>(left: E): Either<E, A> {
  return { _tag: "Left", left };
}

/**
 * Create a Right value
 */
export function Right<E = never, A = unknown>(right: A): Either<E, A> {
  return { _tag: "Right", right };
}

/**
 * Create an Either from a nullable value
 */
export function fromNullable<E, A>(value: A | null | undefined, onNull: () => E): Either<E, A> {
  return value == null ? Left(onNull()) : Right(value);
}

/**
 * Create an Either from a try/catch
 */
export function tryCatch<E, A>(f: () => A, onError: (error: unknown) => E): Either<E, A> {
  try {
    return Right(f());
  } catch (error) {
    return Left(onError(error));
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if Either is Left
 */
export function isLeft<E, A>(either: Either<E, A>): either is Left<E> {
  return either._tag === "Left";
}

/**
 * Check if Either is Right
 */
export function isRight<E, A>(either: Either<E, A>): either is Right<A> {
  return either._tag === "Right";
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Map over the Right value
 */
export function map<E, A, B>(either: Either<E, A>, f: (a: A) => B): Either<E, B> {
  return isRight(either) ? Right(f(either.right)) : either;
}

/**
 * FlatMap over the Right value
 */
export function flatMap<E, A, B>(either: Either<E, A>, f: (a: A) => Either<E, B>): Either<E, B> {
  return isRight(either) ? f(either.right) : either;
}

/**
 * Fold over Either - provide handlers for both cases
 */
export function fold<E, A, B>(either: Either<E, A>, onLeft: (e: E) => B, onRight: (a: A) => B): B {
  return isLeft(either) ? onLeft(either.left) : onRight(either.right);
}

/**
 * Collapse an Either whose sides share a type
 */
export function merge<A>(either: Either<A, A>): A {
  return isLeft(either) ? either.left : either.right;
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Eq instance for Either
 */
export function getEq<E, A>(EE: Eq<E>, EA: Eq<A>): Eq<Either<E, A>> {
  return {
    eqv: (x, y) => {
      if (isLeft(x) && isLeft(y)) return EE.eqv(x.left, y.left);
      if (isRight(x) && isRight(y)) return EA.eqv(x.right, y.right);
      return false;
    },
  };
}

/**
 * Show instance for Either
 */
export function getShow<E, A>(SE: Show<E>, SA: Show<A>): Show<Either<E, A>> {
  return {
    show: (either) => (isLeft(either) ? `Left(${SE.show(either.left)})` : `Right(${SA.show(either.right)})`),
  };
}

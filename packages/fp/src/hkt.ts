/**
 * Higher-Kinded Types for @strata/fp
 *
 * A type-level function is an interface extending `TypeFunction` whose `_`
 * member mentions `this["__kind__"]`. Applying it to an argument intersects
 * the interface with `{ __kind__: A }` and reads `_` back out, so `this`
 * is bound to the argument:
 *
 * ```typescript
 * interface OptionF extends TypeFunction {
 *   readonly __kind__: unknown;
 *   readonly _: Option<this["__kind__"]>;
 * }
 *
 * type N = $<OptionF, number>; // → number | null
 * ```
 *
 * For a concrete type function the application resolves immediately; for a
 * type parameter `F` it stays deferred, so generic code can only touch
 * `$<F, A>` values through a typeclass dictionary for `F`.
 *
 * ## Multi-arity type constructors
 *
 * For types with multiple parameters (Either<E, A>, Env<E, A>), we fix all
 * but one parameter and vary the rightmost:
 *
 * ```typescript
 * interface EitherF<E> extends TypeFunction { readonly _: Either<E, this["__kind__"]> }
 * // $<EitherF<string>, number> → Either<string, number>
 * ```
 */

import type { Option } from "./data/option.js";
import type { Either } from "./data/either.js";
import type { Env, EnvT } from "./data/env.js";
import type { State } from "./data/state.js";

// ============================================================================
// Core encoding
// ============================================================================

/**
 * Base interface for type-level functions.
 */
export interface TypeFunction {
  readonly __kind__: unknown;
  readonly _: unknown;
}

/**
 * Apply the type function `F` to `A`.
 */
export type $<F extends TypeFunction, A> = (F & { readonly __kind__: A })["_"];

/**
 * Alias for `$<F, A>`.
 */
export type Kind<F extends TypeFunction, A> = $<F, A>;

// ============================================================================
// Type-Level Functions for Built-in Types
// ============================================================================

/**
 * Type-level function for `Array<A>`.
 *
 * @example
 * ```typescript
 * type NumberArray = $<ArrayF, number>; // → Array<number>
 * ```
 */
export interface ArrayF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Array<this["__kind__"]>;
}

// ============================================================================
// Type-Level Functions for @strata/fp Data Types
// ============================================================================

/**
 * Type-level function for `Id<A>` (Identity).
 *
 * @example
 * ```typescript
 * type Identity = $<IdF, number>; // → number (Id is transparent)
 * ```
 */
export interface IdF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: this["__kind__"];
}

/**
 * Type-level function for `Option<A>`.
 */
export interface OptionF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Option<this["__kind__"]>;
}

/**
 * Type-level function for `Either<E, A>` with E fixed.
 *
 * @example
 * ```typescript
 * type StringResult<A> = $<EitherF<string>, A>; // → Either<string, A>
 * ```
 */
export interface EitherF<E> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Either<E, this["__kind__"]>;
}

/**
 * Type-level function for the environment comonad `Env<E, A>` with E fixed.
 *
 * @example
 * ```typescript
 * type Annotated<A> = $<EnvF<number>, A>; // → readonly [number, A]
 * ```
 */
export interface EnvF<E> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Env<E, this["__kind__"]>;
}

/**
 * Type-level function for the environment transformer `EnvT<E, W, A>`.
 */
export interface EnvTF<E, W extends TypeFunction> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: EnvT<E, W, this["__kind__"]>;
}

/**
 * Type-level function for `State<S, A>` with S fixed.
 */
export interface StateF<S> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: State<S, this["__kind__"]>;
}

/**
 * Type-level function for the constant functor: `$<ConstF<C>, A> = C`.
 * Traversing with its applicative accumulates a monoid and ignores the
 * rebuilt structure.
 */
export interface ConstF<C> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: C;
}

// ============================================================================
// Simple Type Aliases
// ============================================================================

/**
 * Id is the identity functor — it does nothing, just wraps a value.
 * At the type level, `Id<A> = A`.
 */
export type Id<A> = A;

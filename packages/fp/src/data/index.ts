/**
 * Data Types Index
 *
 * Types and constructors are exported directly; the full set of operations
 * for each type is exported as a namespace (`OptionOps.map`, `EitherOps.fold`).
 */

// ============================================================================
// Option — optional values (null-based)
// ============================================================================

export { Some, None, isSome, isNone } from "./option.js";
export type { Option } from "./option.js";
export * as OptionOps from "./option.js";

// ============================================================================
// Either — Typed error handling
// ============================================================================

export { Left, Right, isLeft, isRight } from "./either.js";
export type { Either } from "./either.js";
export * as EitherOps from "./either.js";

// ============================================================================
// Id — Identity functor
// ============================================================================

export type { Id } from "./id.js";
export * as IdOps from "./id.js";

// ============================================================================
// Env / EnvT — environment comonad and transformer
// ============================================================================

export { env, ask, lower, local } from "./env.js";
export type { Env, EnvT } from "./env.js";

// ============================================================================
// State — stateful computations
// ============================================================================

export type { State } from "./state.js";
export * as StateOps from "./state.js";

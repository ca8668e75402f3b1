/**
 * Show Typeclass
 *
 * A type class for converting values to their string representation.
 * Unlike toString(), Show is intended to produce a "programmer-friendly"
 * representation.
 */

// ============================================================================
// Show
// ============================================================================

/**
 * Show typeclass
 */
export interface Show<A> {
  readonly show: (a: A) => string;
}

// ============================================================================
// Common Instances
// ============================================================================

/**
 * Show for strings (with quotes)
 */
export const showString: Show<string> = {
  show: (s) => JSON.stringify(s),
};

export const showNumber: Show<number> = {
  show: (n) => String(n),
};

// ============================================================================
// Combinators
// ============================================================================

/**
 * Show using a custom function
 */
export function makeShow<A>(show: (a: A) => string): Show<A> {
  return { show };
}

/**
 * State
 *
 * State<S, A> represents a computation that takes a state of type S,
 * and produces both a value of type A and a new state.
 *
 * State<S, A> = S => [A, S]
 */

// ============================================================================
// State Type Definition
// ============================================================================

export type State<S, A> = (s: S) => readonly [A, S];

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a State that returns a pure value
 */
export function pure<S, A>(a: A): State<S, A> {
  return (s) => [a, s];
}

/**
 * Get the current state
 */
export function get<S>(): State<S, S> {
  return (s) => [s, s];
}

/**
 * Modify the state
 */
export function modify<S>(f: (s: S) => S): State<S, void> {
  return (s) => [undefined, f(s)];
}

// ============================================================================
// Derived Operations
// ============================================================================

export function map<S, A, B>(sa: State<S, A>, f: (a: A) => B): State<S, B> {
  return (s) => {
    const [a, s2] = sa(s);
    return [f(a), s2];
  };
}

/**
 * FlatMap (chain) - sequence two stateful computations
 */
export function flatMap<S, A, B>(sa: State<S, A>, f: (a: A) => State<S, B>): State<S, B> {
  return (s) => {
    const [a, s2] = sa(s);
    return f(a)(s2);
  };
}

/**
 * Run and return only the result value
 */
export function runA<S, A>(sa: State<S, A>, s: S): A {
  return sa(s)[0];
}

/**
 * Run and return only the final state
 */
export function runS<S, A>(sa: State<S, A>, s: S): S {
  return sa(s)[1];
}

/**
 * Property-based test runner.
 */

import { config } from "@strata/core";

import type { Gen } from "./gen.js";
import { seeded } from "./gen.js";

/**
 * A property either throws (an assertion failed) or returns `false` to fail.
 */
export type Property<T> = (value: T) => void | boolean;

/**
 * Number of runs and base seed for a property, read from `laws.runs` and
 * `laws.seed` unless given.
 */
export interface RunOptions {
  readonly runs?: number;
  readonly seed?: number;
}

export function resolveRunOptions(options: RunOptions = {}): Required<RunOptions> {
  return {
    runs: options.runs ?? config.getNumber("laws.runs", 100),
    seed: options.seed ?? config.getNumber("laws.seed", 0),
  };
}

/**
 * Run a property-based test with generated values.
 *
 * Case `i` is generated from seed `laws.seed + i`, so a failure report
 * names the seed that reproduces it.
 *
 * @param generator - The generator for inputs
 * @param countOrProperty - Either the number of iterations or the property function
 * @param property - The property function (if count is provided)
 *
 * @example
 * ```typescript
 * // Basic usage (`laws.runs` iterations, 100 by default)
 * forAll(Gen.int(0, 9), (n) => {
 *   expect(n).toBeLessThan(10);
 * });
 *
 * // With custom iteration count
 * forAll(terms, 500, (t) => eq.eqv(roundTrip(t), t));
 * ```
 */
export function forAll<T>(
  generator: Gen<T>,
  countOrProperty: number | Property<T>,
  property?: Property<T>,
): void {
  const prop = typeof countOrProperty === "function" ? countOrProperty : property;
  if (prop === undefined) {
    throw new TypeError("forAll: missing property function");
  }
  const { runs, seed } = resolveRunOptions(
    typeof countOrProperty === "number" ? { runs: countOrProperty } : {},
  );
  const draw = seeded(generator);

  for (let i = 0; i < runs; i++) {
    const caseSeed = seed + i;
    const value = draw(caseSeed);
    let failure: string | undefined;
    try {
      if (prop(value) === false) failure = "property returned false";
    } catch (e) {
      failure = e instanceof Error ? e.message : String(e);
    }
    if (failure !== undefined) {
      throw new Error(
        `Property failed after ${i + 1} tests (seed ${caseSeed}).\n` +
          `Failing input: ${describeValue(value)}\n` +
          `Error: ${failure}`,
      );
    }
  }
}

export function describeValue(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

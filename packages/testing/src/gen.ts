/**
 * Generators
 *
 * A `Gen<T>` draws a value from a `Random` source. `size` bounds recursive
 * and collection generators; `Gen.recursive` halves it on each level so
 * generated trees stay finite.
 *
 * @example
 * ```typescript
 * const tree: Gen<Tree> = Gen.recursive(
 *   Gen.map(Gen.int(0, 9), leaf),
 *   (self) => Gen.map(Gen.tuple(self, self), ([l, r]) => node(l, r)),
 * );
 * sample(tree, 42); // same tree for the same seed
 * ```
 */

import type { Random } from "./random.js";
import { mulberry32 } from "./random.js";

export type Gen<T> = (rng: Random, size: number) => T;

export const DEFAULT_SIZE = 8;

function constant<T>(value: T): Gen<T> {
  return () => value;
}

function int(lo: number, hi: number): Gen<number> {
  return (rng) => rng.int(lo, hi);
}

function nat(max: number): Gen<number> {
  return int(0, max);
}

const bool: Gen<boolean> = (rng) => rng.next() < 0.5;

function elements<T>(...values: readonly [T, ...T[]]): Gen<T> {
  return (rng) => values[rng.int(0, values.length - 1)];
}

function oneOf<T>(...gens: readonly [Gen<T>, ...Gen<T>[]]): Gen<T> {
  return (rng, size) => gens[rng.int(0, gens.length - 1)](rng, size);
}

function frequency<T>(...weighted: readonly [readonly [number, Gen<T>], ...(readonly [number, Gen<T>])[]]): Gen<T> {
  const total = weighted.reduce((sum, [w]) => sum + w, 0);
  return (rng, size) => {
    let pick = rng.next() * total;
    for (const [weight, gen] of weighted) {
      if (pick < weight) return gen(rng, size);
      pick -= weight;
    }
    return weighted[weighted.length - 1][1](rng, size);
  };
}

function map<A, B>(gen: Gen<A>, f: (a: A) => B): Gen<B> {
  return (rng, size) => f(gen(rng, size));
}

function tuple<A, B>(ga: Gen<A>, gb: Gen<B>): Gen<readonly [A, B]>;
function tuple<A, B, C>(ga: Gen<A>, gb: Gen<B>, gc: Gen<C>): Gen<readonly [A, B, C]>;
function tuple(...gens: Gen<unknown>[]): Gen<readonly unknown[]> {
  return (rng, size) => gens.map((gen) => gen(rng, size));
}

function array<T>(gen: Gen<T>, maxLength?: number): Gen<T[]> {
  return (rng, size) => {
    const length = rng.int(0, maxLength ?? size);
    return Array.from({ length }, () => gen(rng, size));
  };
}

function option<T>(gen: Gen<T>): Gen<T | null> {
  return frequency<T | null>([1, constant<T | null>(null)], [3, gen]);
}

function sized<T>(f: (size: number) => Gen<T>): Gen<T> {
  return (rng, size) => f(size)(rng, size);
}

function resize<T>(gen: Gen<T>, size: number): Gen<T> {
  return (rng) => gen(rng, size);
}

/**
 * Build a generator for a recursive structure. At size 0 only `leaf` is
 * used; otherwise `branch` is chosen two times out of three and its
 * recursive occurrences run at half the size.
 */
function recursive<T>(leaf: Gen<T>, branch: (self: Gen<T>) => Gen<T>): Gen<T> {
  const self: Gen<T> = (rng, size) => {
    if (size <= 0) return leaf(rng, 0);
    const smaller = resize(self, Math.floor(size / 2));
    return frequency([1, leaf], [2, branch(smaller)])(rng, size);
  };
  return self;
}

export const Gen = {
  constant,
  int,
  nat,
  bool,
  elements,
  oneOf,
  frequency,
  map,
  tuple,
  array,
  option,
  sized,
  resize,
  recursive,
};

/**
 * Draw one value from a generator for a given seed.
 */
export function sample<T>(gen: Gen<T>, seed: number, size: number = DEFAULT_SIZE): T {
  return gen(mulberry32(seed), size);
}

/**
 * Turn a generator into the `(seed) => value` form used by `forAll`.
 */
export function seeded<T>(gen: Gen<T>, size: number = DEFAULT_SIZE): (seed: number) => T {
  return (seed) => sample(gen, seed, size);
}

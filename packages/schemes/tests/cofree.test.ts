/**
 * Attributed terms (Cofree) and partial terms (Free).
 */

import { describe, it, expect } from "vitest";
import { StrataError } from "@strata/core";
import { comonadLaws, eqNumber, eqStrict, foldMap, monoidArray, showNumber, toArray } from "@strata/fp";
import type { EnvT } from "@strata/fp";
import { Gen, forAll, verifyLaws } from "@strata/testing";
import {
  annotate,
  attrK,
  attrSelf,
  cata,
  cofreeBirecursive,
  cofreeComonad,
  cofreeEq,
  cofreeFoldable,
  cofreeFunctor,
  convertTo,
  forget,
  freeMonad,
  futu,
  liftF,
  pure,
  recursiveLaws,
  recursiveEq,
  unfoldCofree,
  universe,
  zipAttributes,
} from "../src/index.js";
import type { Cofree, Free, Mu } from "../src/index.js";
import { ExpShape, Mul, Num, evaluate, arithGen, exp, expMu, lam, mul, num, termEq, termGen, toMu, vari } from "./fixtures/exp.js";
import type { Exp, ExpF, Term } from "./fixtures/exp.js";

const selves = (t: Term): Cofree<ExpF, Term> => cata(exp)(t, attrSelf(exp));
const constant = <A>(t: Term, k: A): Cofree<ExpF, A> => cata(exp)(t, attrK<ExpF, A>(k));

// ============================================================================
// Attribution
// ============================================================================

describe("attrSelf", () => {
  it("annotates every node with its own subterm", () => {
    const C = cofreeBirecursive<ExpF, Term>(ExpShape, termEq);
    forAll(termGen, (t) => {
      expect(universe(C)(selves(t))).toEqual(universe(exp)(t).map(selves));
    });
  });

  it("puts the whole term at the root", () => {
    const v = mul(num(1), lam("x", vari("x")));
    expect(selves(v).head).toEqual(v);
  });
});

describe("forget", () => {
  it("drops unit attributes", () => {
    forAll(termGen, (t) => {
      expect(forget(exp)(constant<void>(t, undefined))).toEqual(t);
    });
  });

  it("agrees with converting through the attributed encoding", () => {
    const C = cofreeBirecursive<ExpF, void>(ExpShape);
    const drop = (c: Cofree<ExpF, void>): Term => cata(C)(c, ([, layer]: EnvT<void, ExpF, Term>): Term => exp.embed(layer));
    forAll(termGen, (t) => termEq.eqv(drop(constant<void>(t, undefined)), t));
  });

  it("can rebuild into Mu", () => {
    const fromMu: (t: Mu<ExpF>) => Term = convertTo(expMu, exp);
    const v = mul(num(2), num(3));
    expect(fromMu(forget(expMu)(selves(v)))).toEqual(v);
  });
});

describe("cofreeFoldable", () => {
  const F = cofreeFoldable<ExpF>(ExpShape);

  it("folds constant attributes to one per node", () => {
    forAll(termGen, (t) => {
      expect(foldMap(F)(monoidArray<number>())(constant(t, 0), (a: number) => [a])).toEqual(
        universe(exp)(t).map(() => 0),
      );
    });
  });

  it("folds selves in pre-order", () => {
    forAll(termGen, (t) => {
      expect(toArray(F)(selves(t))).toEqual(universe(exp)(t));
    });
  });

  it("folds right in pre-order too", () => {
    const tree = annotate(exp)(mul(num(2), mul(num(3), num(4))), evaluate);
    const empty: readonly number[] = [];
    expect(F.foldRight(tree, empty, (a: number, acc: readonly number[]) => [a, ...acc])).toEqual([24, 2, 12, 3, 4]);
  });
});

describe("annotate", () => {
  it("keeps every intermediate result", () => {
    const tree = annotate(exp)(mul(num(2), mul(num(3), num(4))), evaluate);
    expect(tree.head).toBe(24);
    expect(toArray(cofreeFoldable<ExpF>(ExpShape))(tree)).toEqual([24, 2, 12, 3, 4]);
  });

  it("maps every attribute and keeps the shape", () => {
    const tree = annotate(exp)(mul(num(2), mul(num(3), num(4))), evaluate);
    const scaled = cofreeFunctor<ExpF>(ExpShape).map(tree, (n: number) => n * 10);
    expect(toArray(cofreeFoldable<ExpF>(ExpShape))(scaled)).toEqual([240, 20, 120, 30, 40]);
    expect(forget(exp)(scaled)).toEqual(forget(exp)(tree));
  });

  it("the root attribute is the fold", () => {
    forAll(arithGen, (t) => annotate(exp)(t, evaluate).head === cata(exp)(t, evaluate));
  });
});

describe("zipAttributes", () => {
  const zip = zipAttributes(ExpShape);

  it("pairs the attributes of two annotations", () => {
    forAll(termGen, (t) => {
      expect(zip(constant(t, 0), constant(t, 1))).toEqual(constant(t, [0, 1]));
    });
  });

  it("raises S1001 on different shapes", () => {
    const thrown = (): unknown => {
      try {
        return zip(constant(mul(num(1), num(2)), 0), constant(num(1), 1));
      } catch (e) {
        return e;
      }
    };
    const error = thrown();
    expect(error).toBeInstanceOf(StrataError);
    expect(error instanceof StrataError && error.message).toBe(
      "Cannot zip attributed terms of different shapes (Mul(_, _) vs 1)",
    );
  });
});

// ============================================================================
// Instances
// ============================================================================

describe("cofreeComonad", () => {
  const W = cofreeComonad<ExpF>(ExpShape);
  const eq = cofreeEq(ExpShape, eqNumber);
  const sumBelow = (c: Cofree<ExpF, number>): number => toArray(cofreeFoldable<ExpF>(ExpShape))(c).reduce((a, b) => a + b, 0);
  const depth = (c: Cofree<ExpF, number>): number =>
    1 + ExpShape.foldLeft(c.tail, 0, (m: number, child: Cofree<ExpF, number>) => Math.max(m, depth(child)));

  it("satisfies the comonad laws", () => {
    const gen = Gen.map(arithGen, (t) => annotate(exp)(t, evaluate));
    expect(verifyLaws(comonadLaws(W, eq, eqNumber, sumBelow, depth), gen).failed).toBe(0);
  });

  it("extract reads the root attribute", () => {
    expect(W.extract(constant(num(1), 7))).toBe(7);
  });

  it("duplicate attributes each node with its own subtree", () => {
    const tree = annotate(exp)(mul(num(2), num(3)), evaluate);
    const dup = W.coflatMap(tree, (c: Cofree<ExpF, number>) => c);
    expect(dup.head).toBe(tree);
    expect(W.map(dup, (c: Cofree<ExpF, number>) => c.head)).toEqual(tree);
  });
});

describe("cofreeBirecursive", () => {
  it("round-trips attributed layers", () => {
    const C = cofreeBirecursive<ExpF, number>(ExpShape, eqNumber, showNumber);
    const gen = Gen.map(arithGen, (t) => annotate(exp)(t, evaluate));
    expect(verifyLaws(recursiveLaws(C, recursiveEq(C)), gen).failed).toBe(0);
  });

  it("renders the attribute beside the layer", () => {
    const C = cofreeBirecursive<ExpF, number>(ExpShape, eqStrict(), showNumber);
    expect(C.shape.show1(showNumber).show([6, Mul(2, 3)])).toBe("6 :< Mul(2, 3)");
  });
});

describe("unfoldCofree", () => {
  it("grows attributes from seeds", () => {
    const countdown = unfoldCofree<ExpF>(ExpShape)(3, (n: number): readonly [number, Exp<number>] => [
      n,
      n > 0 ? Mul(n - 1, n - 1) : Num(0),
    ]);
    expect(toArray(cofreeFoldable<ExpF>(ExpShape))(countdown)).toEqual([3, 2, 1, 0, 0, 1, 0, 0, 2, 1, 0, 0, 1, 0, 0]);
  });
});

// ============================================================================
// Free
// ============================================================================

describe("freeMonad", () => {
  const M = freeMonad<ExpF>(ExpShape);
  const liftExp = liftF<ExpF>(ExpShape);

  it("grafts onto every leaf", () => {
    const partial: Free<ExpF, number> = liftExp<number>(Mul(1, 2));
    const grown = M.flatMap(partial, (n: number) => liftExp<number>(Mul(n, n)));
    const unfold = (fr: Free<ExpF, number>): Term =>
      futu(exp)(fr, (x: Free<ExpF, number>): Exp<Free<ExpF, Free<ExpF, number>>> =>
        x._tag === "Pure" ? Num(x.value) : ExpShape.map(x.layer, (c: Free<ExpF, number>) => pure<ExpF, Free<ExpF, number>>(c)),
      );
    expect(unfold(grown)).toEqual(mul(mul(num(1), num(1)), mul(num(2), num(2))));
  });

  it("pure is a left identity", () => {
    const f = (n: number): Free<ExpF, number> => liftExp<number>(Mul(n, n + 1));
    expect(M.flatMap(M.pure(4), f)).toEqual(f(4));
  });

  it("flatMap with pure is the identity", () => {
    const partial = liftExp<number>(Mul(1, 2));
    expect(M.flatMap(partial, (n: number) => M.pure(n))).toEqual(partial);
  });
});

describe("Cofree and Mu", () => {
  it("annotates Mu terms", () => {
    const v = mul(num(2), num(5));
    expect(annotate(expMu)(toMu(v), evaluate).head).toBe(10);
  });

  it("cofreeEq compares attributes and shapes", () => {
    const eq = cofreeEq(ExpShape, eqNumber);
    expect(eq.eqv(constant(num(1), 0), constant(num(1), 0))).toBe(true);
    expect(eq.eqv(constant(num(1), 0), constant(num(1), 1))).toBe(false);
    expect(eq.eqv(constant(num(1), 0), constant(num(2), 0))).toBe(false);
  });
});

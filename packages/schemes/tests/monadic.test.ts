import { describe, it, expect } from "vitest";
import { Left, Right, eitherMonad, idMonad, optionMonad } from "@strata/fp";
import type { Either, IdF, Option, OptionF } from "@strata/fp";
import { forAll } from "@strata/testing";
import { cata, cataM, paraM, traverseM, transCata, transCataM, transAnaM, transAna } from "../src/index.js";
import { ExpShape, Mul, Num, arithGen, evaluate, exp, mul, num, termGen, vari } from "./fixtures/exp.js";
import type { Exp, ExpF, Term } from "./fixtures/exp.js";

describe("traverseM", () => {
  it("visits children left to right", () => {
    const seen: number[] = [];
    const result = traverseM<ExpF, IdF>(ExpShape, idMonad)(Mul(1, 2), (n: number) => {
      seen.push(n);
      return n * 10;
    });
    expect(result).toEqual(Mul(10, 20));
    expect(seen).toEqual([1, 2]);
  });

  it("does not start a sibling after a failure", () => {
    const seen: number[] = [];
    const result = traverseM<ExpF, OptionF>(ExpShape, optionMonad)(Mul(1, 2), (n: number): Option<number> => {
      seen.push(n);
      return null;
    });
    expect(result).toBe(null);
    expect(seen).toEqual([1]);
  });
});

describe("cataM", () => {
  const failOnZero = (visited: number[]) => (fa: Exp<number>): Either<string, number> => {
    const value = evaluate(fa);
    visited.push(value);
    return value === 0 ? Left("zero") : Right(value);
  };

  it("matches cata when nothing fails", () => {
    forAll(arithGen, (t) => {
      expect(cataM(exp)(idMonad)(t, evaluate)).toBe(cata(exp)(t, evaluate));
    });
  });

  it("stops at the first failure", () => {
    const visited: number[] = [];
    const t = mul(mul(num(2), num(0)), mul(num(3), num(4)));
    expect(cataM(exp)(eitherMonad<string>())(t, failOnZero(visited))).toEqual(Left("zero"));
    // 2 then 0 fails; the right subtree and the root are never folded
    expect(visited).toEqual([2, 0]);
  });

  it("folds everything in post-order on success", () => {
    const visited: number[] = [];
    const t = mul(mul(num(2), num(5)), num(3));
    expect(cataM(exp)(eitherMonad<string>())(t, failOnZero(visited))).toEqual(Right(30));
    expect(visited).toEqual([2, 5, 10, 3, 30]);
  });
});

describe("paraM", () => {
  it("sees original subterms", () => {
    const countLiterals = (ft: Exp<readonly [Term, number]>): Option<number> => {
      if (ft._tag === "Var") return null;
      return ExpShape.foldLeft(ft, ft._tag === "Num" ? 1 : 0, (acc: number, [, n]: readonly [Term, number]) => acc + n);
    };
    expect(paraM(exp)(optionMonad)(mul(num(1), mul(num(2), num(3))), countLiterals)).toBe(3);
    expect(paraM(exp)(optionMonad)(mul(num(1), vari("x")), countLiterals)).toBe(null);
  });
});

describe("effectful rewrites", () => {
  const addOne = (ft: Exp<Term>): Exp<Term> => (ft._tag === "Num" ? Num(ft.value + 1) : ft);

  it("transCataM over Id equals transCata", () => {
    forAll(termGen, (t) => {
      expect(transCataM(exp)(idMonad)(t, addOne)).toEqual(transCata(exp)(t, addOne));
    });
  });

  it("transAnaM over Id equals transAna", () => {
    forAll(termGen, (t) => {
      expect(transAnaM(exp)(idMonad)(t, addOne)).toEqual(transAna(exp)(t, addOne));
    });
  });

  it("transCataM aborts on a failing layer", () => {
    const noVars = (ft: Exp<Term>): Option<Exp<Term>> => (ft._tag === "Var" ? null : addOne(ft));
    expect(transCataM(exp)(optionMonad)(mul(num(1), num(2)), noVars)).toEqual(mul(num(2), num(3)));
    expect(transCataM(exp)(optionMonad)(mul(num(1), vari("x")), noVars)).toBe(null);
  });
});

/**
 * A small expression language used as the example shape in the tests.
 *
 * Equality on variables only compares the first three characters of the
 * name, so tests can tell `eq1` apart from structural `===`/`toEqual`.
 */

import { map2 } from "@strata/fp";
import type { $, Applicative, Eq, Show, TypeFunction } from "@strata/fp";
import { Gen } from "@strata/testing";
import { convertTo, fix, fixEq, fixShow, mu, unzipByMap } from "../../src/index.js";
import type { Fix, Mu, Shape, Unzip } from "../../src/index.js";

// ============================================================================
// Layer
// ============================================================================

export type Exp<A> =
  | { readonly _tag: "Num"; readonly value: number }
  | { readonly _tag: "Mul"; readonly left: A; readonly right: A }
  | { readonly _tag: "Var"; readonly name: string }
  | { readonly _tag: "Lambda"; readonly param: string; readonly body: A }
  | { readonly _tag: "Apply"; readonly func: A; readonly arg: A }
  | { readonly _tag: "Let"; readonly name: string; readonly value: A; readonly inBody: A };

export interface ExpF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Exp<this["__kind__"]>;
}

export const Num = <A>(value: number): Exp<A> => ({ _tag: "Num", value });
export const Mul = <A>(left: A, right: A): Exp<A> => ({ _tag: "Mul", left, right });
export const Var = <A>(name: string): Exp<A> => ({ _tag: "Var", name });
export const Lambda = <A>(param: string, body: A): Exp<A> => ({ _tag: "Lambda", param, body });
export const Apply = <A>(func: A, arg: A): Exp<A> => ({ _tag: "Apply", func, arg });
export const Let = <A>(name: string, value: A, inBody: A): Exp<A> => ({ _tag: "Let", name, value, inBody });

function mapExp<A, B>(fa: Exp<A>, f: (a: A) => B): Exp<B> {
  switch (fa._tag) {
    case "Num":
      return Num(fa.value);
    case "Var":
      return Var(fa.name);
    case "Mul":
      return Mul(f(fa.left), f(fa.right));
    case "Lambda":
      return Lambda(fa.param, f(fa.body));
    case "Apply":
      return Apply(f(fa.func), f(fa.arg));
    case "Let":
      return Let(fa.name, f(fa.value), f(fa.inBody));
  }
}

function childrenOf<A>(fa: Exp<A>): A[] {
  switch (fa._tag) {
    case "Num":
    case "Var":
      return [];
    case "Mul":
      return [fa.left, fa.right];
    case "Lambda":
      return [fa.body];
    case "Apply":
      return [fa.func, fa.arg];
    case "Let":
      return [fa.value, fa.inBody];
  }
}

function traverseExp<G extends TypeFunction>(G: Applicative<G>) {
  const both = map2(G);
  return <A, B>(fa: Exp<A>, f: (a: A) => $<G, B>): $<G, Exp<B>> => {
    switch (fa._tag) {
      case "Num":
        return G.pure(Num<B>(fa.value));
      case "Var":
        return G.pure(Var<B>(fa.name));
      case "Mul":
        return both<B, B, Exp<B>>(f(fa.left), f(fa.right), Mul);
      case "Lambda":
        return G.map<B, Exp<B>>(f(fa.body), (b) => Lambda(fa.param, b));
      case "Apply":
        return both<B, B, Exp<B>>(f(fa.func), f(fa.arg), Apply);
      case "Let":
        return both<B, B, Exp<B>>(f(fa.value), f(fa.inBody), (v, i) => Let(fa.name, v, i));
    }
  };
}

const prefix = (name: string): string => name.substring(0, Math.min(3, name.length));

function eqExp<A>(E: Eq<A>): Eq<Exp<A>> {
  return {
    eqv: (x, y) => {
      switch (x._tag) {
        case "Num":
          return y._tag === "Num" && x.value === y.value;
        case "Var":
          return y._tag === "Var" && prefix(x.name) === prefix(y.name);
        case "Mul":
          return y._tag === "Mul" && E.eqv(x.left, y.left) && E.eqv(x.right, y.right);
        case "Lambda":
          return y._tag === "Lambda" && x.param === y.param && E.eqv(x.body, y.body);
        case "Apply":
          return y._tag === "Apply" && E.eqv(x.func, y.func) && E.eqv(x.arg, y.arg);
        case "Let":
          return y._tag === "Let" && x.name === y.name && E.eqv(x.value, y.value) && E.eqv(x.inBody, y.inBody);
      }
    },
  };
}

function showExp<A>(S: Show<A>): Show<Exp<A>> {
  return {
    show: (fa) => {
      switch (fa._tag) {
        case "Num":
          return String(fa.value);
        case "Var":
          return `$${fa.name}`;
        case "Mul":
          return `Mul(${S.show(fa.left)}, ${S.show(fa.right)})`;
        case "Lambda":
          return `Lambda(${fa.param}, ${S.show(fa.body)})`;
        case "Apply":
          return `Apply(${S.show(fa.func)}, ${S.show(fa.arg)})`;
        case "Let":
          return `Let(${fa.name}, ${S.show(fa.value)}, ${S.show(fa.inBody)})`;
      }
    },
  };
}

export const ExpShape: Shape<ExpF> = {
  map: mapExp,
  foldLeft: (fa, b, f) => childrenOf(fa).reduce(f, b),
  foldRight: (fa, b, f) => childrenOf(fa).reduceRight((acc, a) => f(a, acc), b),
  traverse: traverseExp,
  eq1: eqExp,
  show1: showExp,
};

export const ExpUnzip: Unzip<ExpF> = unzipByMap(ExpShape);

// ============================================================================
// Terms
// ============================================================================

export type Term = Fix<ExpF>;

export const exp = fix(ExpShape);
export const expMu = mu(ExpShape);
export const termEq = fixEq(ExpShape);
export const termShow = fixShow(ExpShape);
export const toMu: (t: Term) => Mu<ExpF> = convertTo(exp, expMu);

export const num = (value: number): Term => exp.embed(Num(value));
export const mul = (left: Term, right: Term): Term => exp.embed(Mul(left, right));
export const vari = (name: string): Term => exp.embed(Var(name));
export const lam = (param: string, body: Term): Term => exp.embed(Lambda(param, body));
export const ap = (func: Term, arg: Term): Term => exp.embed(Apply(func, arg));
export const letIn = (name: string, value: Term, inBody: Term): Term => exp.embed(Let(name, value, inBody));

// ============================================================================
// Algebras shared by several suites
// ============================================================================

/**
 * Arithmetic evaluation; only defined on `Num` and `Mul`.
 */
export function evaluate(fa: Exp<number>): number {
  switch (fa._tag) {
    case "Num":
      return fa.value;
    case "Mul":
      return fa.left * fa.right;
    default:
      throw new Error(`cannot evaluate ${fa._tag}`);
  }
}

/**
 * Factor out twos: `x > 2` and even becomes `Mul(2, x / 2)`.
 */
export function extractFactors(x: number): Exp<number> {
  return x > 2 && x % 2 === 0 ? Mul(2, x / 2) : Num(x);
}

// ============================================================================
// Generators
// ============================================================================

const names = Gen.elements("x", "y", "foo", "food", "bar");

/**
 * Terms over every constructor.
 */
export const termGen: Gen<Term> = Gen.recursive<Term>(
  Gen.oneOf(Gen.map(Gen.int(-20, 20), num), Gen.map(names, vari)),
  (self) =>
    Gen.oneOf(
      Gen.map(Gen.tuple(self, self), ([l, r]) => mul(l, r)),
      Gen.map(Gen.tuple(names, self), ([p, b]) => lam(p, b)),
      Gen.map(Gen.tuple(self, self), ([f, a]) => ap(f, a)),
      Gen.map(Gen.tuple(names, self, self), ([n, v, i]) => letIn(n, v, i)),
    ),
);

/**
 * Terms built from `Num` and `Mul` only, so `evaluate` is defined.
 */
export const arithGen: Gen<Term> = Gen.recursive<Term>(Gen.map(Gen.int(-9, 9), num), (self) =>
  Gen.map(Gen.tuple(self, self), ([l, r]) => mul(l, r)),
);

/**
 * A single layer with generated children.
 */
export function layerGen<A>(child: Gen<A>): Gen<Exp<A>> {
  return Gen.oneOf<Exp<A>>(
    Gen.map(Gen.int(-20, 20), (n) => Num<A>(n)),
    Gen.map(names, (n) => Var<A>(n)),
    Gen.map(Gen.tuple(child, child), ([l, r]) => Mul(l, r)),
    Gen.map(Gen.tuple(names, child), ([p, b]) => Lambda(p, b)),
    Gen.map(Gen.tuple(child, child), ([f, a]) => Apply(f, a)),
    Gen.map(Gen.tuple(names, child, child), ([n, v, i]) => Let(n, v, i)),
  );
}

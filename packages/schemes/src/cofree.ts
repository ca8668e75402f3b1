/**
 * Cofree - attributed terms
 *
 * A `Cofree<F, A>` is a term over `F` where every node carries an
 * attribute of type `A`. Tails are built eagerly.
 *
 * Cofree is itself recursive: its shape is the environment transformer
 * `EnvT<A, F, _>`, a pair of the attribute and one `F` layer. That lets
 * every scheme (and `universe`, `children`, ...) run on attributed terms.
 */

import { StrataError, S1001 } from "@strata/core";
import { eqStrict, makeShow, toArray, void_ } from "@strata/fp";
import type {
  $,
  Applicative,
  Comonad,
  Eq,
  EnvT,
  EnvTF,
  Foldable,
  Functor,
  Show,
  TypeFunction,
} from "@strata/fp";
import type { Algebra } from "./algebra.js";
import { fillLayer } from "./shape.js";
import type { Shape } from "./shape.js";
import type { Birecursive, Corecursive } from "./recursive.js";

// ============================================================================
// Type Definition
// ============================================================================

export interface Cofree<F extends TypeFunction, A> {
  readonly head: A;
  readonly tail: $<F, Cofree<F, A>>;
}

/**
 * Type-level function for `Cofree<F, _>`.
 */
export interface CofreeF<F extends TypeFunction> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Cofree<F, this["__kind__"]>;
}

export function cofree<F extends TypeFunction, A>(head: A, tail: $<F, Cofree<F, A>>): Cofree<F, A> {
  return { head, tail };
}

/**
 * Grow a cofree structure from a seed: each step yields the attribute and
 * the seeds of the children.
 */
export function unfoldCofree<F extends TypeFunction>(
  F: Functor<F>,
): <S, A>(seed: S, f: (s: S) => readonly [A, $<F, S>]) => Cofree<F, A> {
  return <S, A>(seed: S, f: (s: S) => readonly [A, $<F, S>]): Cofree<F, A> => {
    const go = (s: S): Cofree<F, A> => {
      const [head, seeds] = f(s);
      return { head, tail: F.map(seeds, go) };
    };
    return go(seed);
  };
}

// ============================================================================
// Instances
// ============================================================================

export function cofreeFunctor<F extends TypeFunction>(F: Functor<F>): Functor<CofreeF<F>> {
  return { map: cofreeComonad(F).map };
}

export function cofreeComonad<F extends TypeFunction>(F: Functor<F>): Comonad<CofreeF<F>> {
  const map = <A, B>(c: Cofree<F, A>, f: (a: A) => B): Cofree<F, B> => ({
    head: f(c.head),
    tail: F.map(c.tail, (x: Cofree<F, A>) => map(x, f)),
  });
  const coflatMap = <A, B>(c: Cofree<F, A>, f: (c: Cofree<F, A>) => B): Cofree<F, B> => ({
    head: f(c),
    tail: F.map(c.tail, (x: Cofree<F, A>) => coflatMap(x, f)),
  });
  return {
    map,
    coflatMap,
    extract: <A>(c: Cofree<F, A>): A => c.head,
  };
}

/**
 * Folds attributes in pre-order: a node's attribute, then its children's
 * subtrees left to right.
 */
export function cofreeFoldable<F extends TypeFunction>(F: Foldable<F>): Foldable<CofreeF<F>> {
  const foldLeft = <A, B>(c: Cofree<F, A>, b: B, f: (b: B, a: A) => B): B =>
    F.foldLeft(c.tail, f(b, c.head), (acc: B, child: Cofree<F, A>) => foldLeft(child, acc, f));
  const foldRight = <A, B>(c: Cofree<F, A>, b: B, f: (a: A, b: B) => B): B =>
    f(
      c.head,
      F.foldRight(c.tail, b, (child: Cofree<F, A>, acc: B) => foldRight(child, acc, f)),
    );
  return { foldLeft, foldRight };
}

export function cofreeEq<F extends TypeFunction, A>(S: Shape<F>, E: Eq<A>): Eq<Cofree<F, A>> {
  const eq: Eq<Cofree<F, A>> = {
    eqv: (x, y) => E.eqv(x.head, y.head) && S.eq1(eq).eqv(x.tail, y.tail),
  };
  return eq;
}

// ============================================================================
// Cofree as a recursive term
// ============================================================================

/**
 * Shape of one attributed layer: the attribute beside an `F` layer.
 */
export function envTShape<A, F extends TypeFunction>(S: Shape<F>, EA: Eq<A>, SA: Show<A>): Shape<EnvTF<A, F>> {
  return {
    map: <X, Y>(fa: EnvT<A, F, X>, f: (x: X) => Y): EnvT<A, F, Y> => [fa[0], S.map<X, Y>(fa[1], f)],
    foldLeft: <X, B>(fa: EnvT<A, F, X>, b: B, f: (b: B, x: X) => B): B => S.foldLeft<X, B>(fa[1], b, f),
    foldRight: <X, B>(fa: EnvT<A, F, X>, b: B, f: (x: X, b: B) => B): B => S.foldRight<X, B>(fa[1], b, f),
    traverse:
      <G extends TypeFunction>(G: Applicative<G>) =>
      <X, Y>(fa: EnvT<A, F, X>, f: (x: X) => $<G, Y>): $<G, EnvT<A, F, Y>> =>
        G.map(S.traverse(G)<X, Y>(fa[1], f), (layer: $<F, Y>): EnvT<A, F, Y> => [fa[0], layer]),
    eq1: <X>(E: Eq<X>): Eq<EnvT<A, F, X>> => ({
      eqv: (x, y) => EA.eqv(x[0], y[0]) && S.eq1(E).eqv(x[1], y[1]),
    }),
    show1: <X>(SX: Show<X>): Show<EnvT<A, F, X>> => ({
      show: (x) => `${SA.show(x[0])} :< ${S.show1(SX).show(x[1])}`,
    }),
  };
}

export function cofreeBirecursive<F extends TypeFunction, A>(
  S: Shape<F>,
  EA: Eq<A> = eqStrict(),
  SA: Show<A> = makeShow((a: A) => String(a)),
): Birecursive<Cofree<F, A>, EnvTF<A, F>> {
  return {
    shape: envTShape(S, EA, SA),
    project: (c) => [c.head, c.tail],
    embed: ([head, tail]) => ({ head, tail }),
  };
}

// ============================================================================
// Attribution
// ============================================================================

/**
 * Keep every intermediate result of an algebra as the node's attribute.
 */
export function attributeAlgebra<F extends TypeFunction>(
  F: Functor<F>,
): <A>(alg: Algebra<F, A>) => Algebra<F, Cofree<F, A>> {
  return <A>(alg: Algebra<F, A>) =>
    (fc: $<F, Cofree<F, A>>): Cofree<F, A> => ({
      head: alg(F.map(fc, (c: Cofree<F, A>) => c.head)),
      tail: fc,
    });
}

/**
 * Attribute every node with the same constant.
 */
export function attrK<F extends TypeFunction, A>(k: A): Algebra<F, Cofree<F, A>> {
  return (fc) => ({ head: k, tail: fc });
}

/**
 * Attribute every node with the subterm rooted there.
 */
export function attrSelf<T, F extends TypeFunction>(C: Corecursive<T, F>): Algebra<F, Cofree<F, T>> {
  return attributeAlgebra(C.shape)<T>(C.embed);
}

/**
 * Drop every attribute.
 */
export function forget<T, F extends TypeFunction>(C: Corecursive<T, F>): <A>(c: Cofree<F, A>) => T {
  const F = C.shape;
  return <A>(c: Cofree<F, A>): T => {
    const go = (x: Cofree<F, A>): T => C.embed(F.map(x.tail, go));
    return go(c);
  };
}

/**
 * Pair the attributes of two annotations of the same term.
 *
 * @throws StrataError S1001 when the two terms differ in shape at some node
 */
export function zipAttributes<F extends TypeFunction>(
  S: Shape<F>,
): <A, B>(x: Cofree<F, A>, y: Cofree<F, B>) => Cofree<F, readonly [A, B]> {
  const erase = void_(S);
  const sameLayer = S.eq1<void>(eqStrict());
  const showLayer = S.show1<void>(makeShow(() => "_"));
  const fill = fillLayer(S);

  return <A, B>(x: Cofree<F, A>, y: Cofree<F, B>): Cofree<F, readonly [A, B]> => {
    const go = (l: Cofree<F, A>, r: Cofree<F, B>): Cofree<F, readonly [A, B]> => {
      const left = erase<Cofree<F, A>>(l.tail);
      const right = erase<Cofree<F, B>>(r.tail);
      if (!sameLayer.eqv(left, right)) {
        throw new StrataError(S1001, { left: showLayer.show(left), right: showLayer.show(right) });
      }
      const rs = toArray(S)<Cofree<F, B>>(r.tail);
      const zipped = toArray(S)<Cofree<F, A>>(l.tail).map((child, i) => go(child, rs[i]));
      return { head: [l.head, r.head], tail: fill<Cofree<F, A>, Cofree<F, readonly [A, B]>>(l.tail, zipped) };
    };
    return go(x, y);
  };
}

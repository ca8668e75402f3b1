/**
 * Annotated trees
 *
 * A read-only view of any tree whose nodes carry an attribute, for
 * rendering and inspection. Attributed terms (`Cofree`) give one
 * directly; any other node type can supply its own accessors.
 *
 * @example
 * ```typescript
 * const tree = annotatedTree(ExpShape)(annotate(exp)(term, evaluate));
 * renderAnnotatedTree(tree, (n) => n.tail._tag, String);
 * // Mul
 * //   <annotation>: 6
 * //   Num
 * //     <annotation>: 2
 * //   Num
 * //     <annotation>: 3
 * ```
 */

import { config } from "@strata/core";
import { toArray } from "@strata/fp";
import type { Foldable, TypeFunction } from "@strata/fp";
import type { Cofree } from "./cofree.js";

export interface AnnotatedTree<N, A> {
  readonly root: N;
  children(node: N): readonly N[];
  attr(node: N): A;
}

/**
 * A rendered node: a label, an optional value and its children.
 */
export interface RenderNode {
  readonly label: string;
  readonly value?: string;
  readonly children: readonly RenderNode[];
}

export const ANNOTATION_LABEL = "<annotation>";

// ============================================================================
// Constructors
// ============================================================================

export function makeAnnotatedTree<N, A>(
  root: N,
  children: (node: N) => readonly N[],
  attr: (node: N) => A,
): AnnotatedTree<N, A> {
  return { root, children, attr };
}

export function annotatedTree<F extends TypeFunction>(
  F: Foldable<F>,
): <A>(c: Cofree<F, A>) => AnnotatedTree<Cofree<F, A>, A> {
  const list = toArray(F);
  return <A>(c: Cofree<F, A>) =>
    makeAnnotatedTree<Cofree<F, A>, A>(
      c,
      (node) => list<Cofree<F, A>>(node.tail),
      (node) => node.head,
    );
}

/**
 * Every node carries the same attribute.
 */
export function constTree<N, A>(root: N, children: (node: N) => readonly N[], k: A): AnnotatedTree<N, A> {
  return makeAnnotatedTree(root, children, () => k);
}

export function unitTree<N>(root: N, children: (node: N) => readonly N[]): AnnotatedTree<N, void> {
  return constTree<N, void>(root, children, undefined);
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Each node becomes a `RenderNode` whose first child holds its attribute
 * under the `<annotation>` label.
 */
export function toRenderNode<N, A>(
  tree: AnnotatedTree<N, A>,
  showNode: (node: N) => string,
  showAttr: (attr: A) => string,
): RenderNode {
  const go = (node: N): RenderNode => ({
    label: showNode(node),
    children: [{ label: ANNOTATION_LABEL, value: showAttr(tree.attr(node)), children: [] }, ...tree.children(node).map(go)],
  });
  return go(tree.root);
}

/**
 * One line per render node, nested `render.indent` spaces per level.
 */
export function formatRenderNode(node: RenderNode, indent: number = config.getNumber("render.indent", 2)): string {
  const lines: string[] = [];
  const go = (n: RenderNode, depth: number): void => {
    const text = n.value === undefined ? n.label : `${n.label}: ${n.value}`;
    lines.push(" ".repeat(depth * indent) + text);
    for (const child of n.children) go(child, depth + 1);
  };
  go(node, 0);
  return lines.join("\n");
}

export function renderAnnotatedTree<N, A>(
  tree: AnnotatedTree<N, A>,
  showNode: (node: N) => string,
  showAttr: (attr: A) => string,
): string {
  return formatRenderNode(toRenderNode(tree, showNode, showAttr));
}

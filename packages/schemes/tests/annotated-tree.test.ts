import { afterEach, describe, it, expect } from "vitest";
import { config } from "@strata/core";
import {
  ANNOTATION_LABEL,
  annotate,
  annotatedTree,
  constTree,
  formatRenderNode,
  renderAnnotatedTree,
  toRenderNode,
  unitTree,
} from "../src/index.js";
import type { Cofree } from "../src/index.js";
import { ExpShape, evaluate, exp, mul, num } from "./fixtures/exp.js";
import type { ExpF } from "./fixtures/exp.js";

const evaluated = annotate(exp)(mul(num(2), num(3)), evaluate);
const tree = annotatedTree<ExpF>(ExpShape)(evaluated);
const tag = (node: Cofree<ExpF, number>): string => node.tail._tag;

interface Dir {
  readonly name: string;
  readonly entries: readonly Dir[];
}

const dirs: Dir = {
  name: "src",
  entries: [{ name: "lib", entries: [] }, { name: "bin", entries: [] }],
};

describe("annotated trees", () => {
  afterEach(() => config.reset());

  it("renders attributes under each node", () => {
    expect(renderAnnotatedTree(tree, tag, String)).toBe(
      ["Mul", "  <annotation>: 6", "  Num", "    <annotation>: 2", "  Num", "    <annotation>: 3"].join("\n"),
    );
  });

  it("puts the annotation first", () => {
    const node = toRenderNode(tree, tag, String);
    expect(node.label).toBe("Mul");
    expect(node.children.map((c) => c.label)).toEqual([ANNOTATION_LABEL, "Num", "Num"]);
    expect(node.children[0]).toEqual({ label: "<annotation>", value: "6", children: [] });
  });

  it("reads the indent from config", () => {
    config.set({ render: { indent: 4 } });
    expect(renderAnnotatedTree(tree, tag, String).split("\n")[3]).toBe("        <annotation>: 2");
  });

  it("takes an explicit indent", () => {
    expect(formatRenderNode({ label: "a", children: [{ label: "b", value: "1", children: [] }] }, 1)).toBe("a\n b: 1");
  });

  it("gives every node the same attribute", () => {
    const t = constTree(dirs, (d) => d.entries, "dir");
    expect(renderAnnotatedTree(t, (d) => d.name, (a) => a)).toBe(
      ["src", "  <annotation>: dir", "  lib", "    <annotation>: dir", "  bin", "    <annotation>: dir"].join("\n"),
    );
  });

  it("carries no attribute in a unit tree", () => {
    const t = unitTree(dirs, (d) => d.entries);
    expect(t.attr(dirs)).toBe(undefined);
    expect(t.children(t.root).map((d) => d.name)).toEqual(["lib", "bin"]);
  });
});

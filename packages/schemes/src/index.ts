/**
 * @strata/schemes — recursion schemes over pluggable shapes
 *
 * Describe one layer of a recursive structure as a `Shape<F>`, pick an
 * encoding (`fix` or `mu`), and fold, unfold or rewrite terms with the
 * schemes below.
 *
 * @example
 * ```typescript
 * import { cata, fix } from "@strata/schemes";
 *
 * const exp = fix(ExpShape);
 * cata(exp)(term, evaluate);
 * ```
 */

// Shapes
export { unzipByMap, childCount, mapWithIndex, fillLayer, type Shape, type Unzip } from "./shape.js";

// Encodings
export { recursiveEq, recursiveShow, type Recursive, type Corecursive, type Birecursive } from "./recursive.js";
export { fix, fixEq, fixShow, type Fix } from "./fix.js";
export { mu, type Mu } from "./mu.js";

// Algebras
export {
  zipAlgebras,
  generalizeAlgebra,
  generalizeCoalgebra,
  once,
  repeatedly,
  type Algebra,
  type Coalgebra,
  type AlgebraM,
  type CoalgebraM,
  type GAlgebra,
  type GCoalgebra,
} from "./algebra.js";

// Attributed and partial terms
export {
  cofree,
  unfoldCofree,
  cofreeFunctor,
  cofreeComonad,
  cofreeFoldable,
  cofreeEq,
  envTShape,
  cofreeBirecursive,
  attributeAlgebra,
  attrK,
  attrSelf,
  forget,
  zipAttributes,
  type Cofree,
  type CofreeF,
} from "./cofree.js";
export { pure, roll, liftF, freeMonad, type Free, type FreeF, type Pure, type Roll } from "./free.js";

// Schemes
export {
  cata,
  para,
  paraZygo,
  histo,
  ana,
  apo,
  futu,
  hylo,
  chrono,
  convertTo,
  annotate,
  transCata,
  transAna,
} from "./schemes.js";
export {
  traverseM,
  cataM,
  paraM,
  anaM,
  apoM,
  topDownCataM,
  topDownCata,
  transCataM,
  transAnaM,
} from "./monadic.js";
export { gcata, gana, ghylo, zygo, gzygo, gpara, ghisto } from "./generalized.js";
export {
  distIdentity,
  distCata,
  distZygo,
  distPara,
  distZygoT,
  distGHisto,
  distHisto,
  distAna,
  distApo,
  distGApo,
  distGFutu,
  distFutu,
  type DistributiveLaw,
} from "./distributive.js";

// Queries
export { children, isLeaf, foldMapM, foldMap, universe, find, any, all, collect, contains } from "./foldable.js";
export { holes, holesList, projectAt, type Hole } from "./holes.js";

// Rendering
export {
  ANNOTATION_LABEL,
  makeAnnotatedTree,
  annotatedTree,
  constTree,
  unitTree,
  toRenderNode,
  formatRenderNode,
  renderAnnotatedTree,
  type AnnotatedTree,
  type RenderNode,
} from "./annotated-tree.js";

// Laws
export { recursiveLaws, distributiveLaws } from "./laws.js";

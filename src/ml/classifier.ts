/**
 * Tree-ensemble classifier evaluated from its exported node arrays.
 *
 * A single decision tree and a random forest share the layout: each
 * estimator is a flat array of nodes where `children_left[i] === -1` marks a
 * leaf and `value[i]` holds the class weights seen at that node.
 */

import { z } from 'zod';

export const LEAF = -1;

const TreeParamsSchema = z.object({
  children_left: z.array(z.number().int()),
  children_right: z.array(z.number().int()),
  feature: z.array(z.number().int()),
  threshold: z.array(z.number()),
  value: z.array(z.array(z.number().nonnegative())),
});

export const ClassifierParamsSchema = z.object({
  model_type: z.enum(['decision_tree', 'random_forest']),
  n_features: z.number().int().positive(),
  n_classes: z.number().int().positive(),
  estimators: z.array(TreeParamsSchema).min(1),
});

export type TreeParams = z.infer<typeof TreeParamsSchema>;
export type ClassifierParams = z.infer<typeof ClassifierParamsSchema>;

export interface Classifier {
  readonly modelType: string;
  readonly nFeatures: number;
  readonly nClasses: number;

  /** Class probabilities for one scaled row, indexed by class */
  predictProba(row: readonly number[]): number[];
}

/**
 * Index of the largest value. Ties go to the lowest index so that the label
 * and the confidence always come from the same class.
 */
export function argMax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) {
      best = i;
    }
  }
  return best;
}

interface CompiledTree {
  left: Int32Array;
  right: Int32Array;
  feature: Int32Array;
  threshold: Float64Array;
  /** Leaf distributions, already normalized; empty rows for internal nodes */
  proba: number[][];
}

function compileTree(tree: TreeParams, nFeatures: number, nClasses: number, index: number): CompiledTree {
  const nodeCount = tree.children_left.length;
  const where = `estimator ${index}`;

  if (nodeCount === 0) {
    throw new Error(`${where}: tree has no nodes`);
  }
  for (const [name, arr] of [
    ['children_right', tree.children_right],
    ['feature', tree.feature],
    ['threshold', tree.threshold],
    ['value', tree.value],
  ] as const) {
    if (arr.length !== nodeCount) {
      throw new Error(`${where}: ${name} has ${arr.length} entries, expected ${nodeCount}`);
    }
  }

  const proba: number[][] = [];
  for (let node = 0; node < nodeCount; node++) {
    const left = tree.children_left[node];
    const right = tree.children_right[node];

    if (left === LEAF) {
      const weights = tree.value[node];
      if (weights.length !== nClasses) {
        throw new Error(`${where}: leaf ${node} has ${weights.length} class weights, expected ${nClasses}`);
      }
      const total = weights.reduce((a, b) => a + b, 0);
      if (total <= 0) {
        throw new Error(`${where}: leaf ${node} has no weight`);
      }
      proba.push(weights.map((w) => w / total));
      continue;
    }

    // Children always come after their parent in the exported layout,
    // which also rules out cycles during traversal.
    if (left <= node || left >= nodeCount || right <= node || right >= nodeCount) {
      throw new Error(`${where}: node ${node} has out-of-range children`);
    }
    const feature = tree.feature[node];
    if (feature < 0 || feature >= nFeatures) {
      throw new Error(`${where}: node ${node} splits on unknown feature ${feature}`);
    }
    proba.push([]);
  }

  return {
    left: Int32Array.from(tree.children_left),
    right: Int32Array.from(tree.children_right),
    feature: Int32Array.from(tree.feature),
    threshold: Float64Array.from(tree.threshold),
    proba,
  };
}

export class TreeEnsembleClassifier implements Classifier {
  readonly modelType: string;
  readonly nFeatures: number;
  readonly nClasses: number;
  private readonly trees: readonly CompiledTree[];

  private constructor(params: ClassifierParams, trees: CompiledTree[]) {
    this.modelType = params.model_type;
    this.nFeatures = params.n_features;
    this.nClasses = params.n_classes;
    this.trees = trees;
  }

  /**
   * Build a classifier from exported parameters, checking the node structure
   */
  static fromParams(params: ClassifierParams): TreeEnsembleClassifier {
    if (params.model_type === 'decision_tree' && params.estimators.length !== 1) {
      throw new Error(`decision_tree expects 1 estimator, got ${params.estimators.length}`);
    }
    const trees = params.estimators.map((tree, i) =>
      compileTree(tree, params.n_features, params.n_classes, i)
    );
    return new TreeEnsembleClassifier(params, trees);
  }

  get estimatorCount(): number {
    return this.trees.length;
  }

  predictProba(row: readonly number[]): number[] {
    if (row.length !== this.nFeatures) {
      throw new Error(`Expected ${this.nFeatures} features, got ${row.length}`);
    }

    const sums = new Array<number>(this.nClasses).fill(0);
    for (const tree of this.trees) {
      const leaf = this.findLeaf(tree, row);
      const proba = tree.proba[leaf];
      for (let c = 0; c < this.nClasses; c++) {
        sums[c] += proba[c];
      }
    }
    return sums.map((s) => s / this.trees.length);
  }

  private findLeaf(tree: CompiledTree, row: readonly number[]): number {
    let node = 0;
    while (tree.left[node] !== LEAF) {
      // Trees are fitted on float32 inputs; compare at that precision.
      const x = Math.fround(row[tree.feature[node]]);
      node = x <= tree.threshold[node] ? tree.left[node] : tree.right[node];
    }
    return node;
  }
}

import Joi from 'joi';
import { Result, err, ok } from '../../types/errors';

/**
 * Serialized binary classifier and its evaluation.
 *
 * Two model families are understood:
 * - logistic_regression: P(1) = sigmoid(intercept + sum(coefficients[i] * x[i]))
 * - random_forest: mean over trees of the class distribution at the leaf each
 *   vector reaches; a split sends x[feature] <= threshold to `left`
 *
 * Child indices in a tree must point forward so evaluation always terminates.
 */

export const ARTIFACT_FORMAT = 'ndd-risk-classifier';

export interface SplitNode {
  feature: number;
  threshold: number;
  left: number;
  right: number;
}

export interface LeafNode {
  value: number[]; // Class weights [negative, positive]
}

export type TreeNode = SplitNode | LeafNode;

export interface DecisionTree {
  nodes: TreeNode[];
}

interface ArtifactBase {
  format: typeof ARTIFACT_FORMAT;
  version: string;
  featureCount: number;
  featureNames?: string[];
  metadata?: Record<string, unknown>;
}

export interface LogisticRegressionDocument extends ArtifactBase {
  modelType: 'logistic_regression';
  coefficients: number[];
  intercept: number;
}

export interface RandomForestDocument extends ArtifactBase {
  modelType: 'random_forest';
  trees: DecisionTree[];
}

export type ArtifactDocument = LogisticRegressionDocument | RandomForestDocument;

export type ClassProbabilities = [negative: number, positive: number];

const splitNodeSchema = Joi.object({
  feature: Joi.number().integer().min(0).required(),
  threshold: Joi.number().required(),
  left: Joi.number().integer().min(1).required(),
  right: Joi.number().integer().min(1).required()
});

const leafNodeSchema = Joi.object({
  value: Joi.array().items(Joi.number().min(0)).length(2).required()
});

const treeSchema = Joi.object({
  nodes: Joi.array().items(Joi.alternatives().try(leafNodeSchema, splitNodeSchema)).min(1).required()
});

export const artifactSchema: Joi.ObjectSchema<ArtifactDocument> = Joi.object({
  format: Joi.string().valid(ARTIFACT_FORMAT).required(),
  version: Joi.string().required(),
  modelType: Joi.string().valid('logistic_regression', 'random_forest').required(),
  featureCount: Joi.number().integer().min(1).required(),
  featureNames: Joi.array().items(Joi.string()).length(Joi.ref('featureCount')),
  metadata: Joi.object().unknown(true),
  coefficients: Joi.when('modelType', {
    is: 'logistic_regression',
    then: Joi.array().items(Joi.number()).length(Joi.ref('featureCount')).required(),
    otherwise: Joi.forbidden()
  }),
  intercept: Joi.when('modelType', {
    is: 'logistic_regression',
    then: Joi.number().required(),
    otherwise: Joi.forbidden()
  }),
  trees: Joi.when('modelType', {
    is: 'random_forest',
    then: Joi.array().items(treeSchema).min(1).required(),
    otherwise: Joi.forbidden()
  })
});

function isLeaf(node: TreeNode): node is LeafNode {
  return 'value' in node;
}

function checkTree(tree: DecisionTree, treeIndex: number, featureCount: number): string | null {
  for (let index = 0; index < tree.nodes.length; index++) {
    const node = tree.nodes[index];
    if (isLeaf(node)) {
      if (node.value[0] + node.value[1] <= 0) {
        return `tree ${treeIndex} node ${index}: leaf has no class weight`;
      }
      continue;
    }
    if (node.feature >= featureCount) {
      return `tree ${treeIndex} node ${index}: feature ${node.feature} out of range`;
    }
    for (const child of [node.left, node.right]) {
      if (child <= index || child >= tree.nodes.length) {
        return `tree ${treeIndex} node ${index}: child ${child} must point forward inside the tree`;
      }
    }
  }
  return null;
}

export class ClassifierArtifact {
  private constructor(private readonly document: ArtifactDocument) {}

  /**
   * Validate a decoded artifact document
   */
  static parse(raw: unknown): Result<ClassifierArtifact, string> {
    const { error, value } = artifactSchema.validate(raw, { abortEarly: true, convert: false });
    if (error) {
      return err(error.message);
    }
    if (value === undefined) {
      return err('artifact document is empty');
    }

    if (value.modelType === 'random_forest') {
      for (let t = 0; t < value.trees.length; t++) {
        const problem = checkTree(value.trees[t], t, value.featureCount);
        if (problem) {
          return err(problem);
        }
      }
    }

    return ok(new ClassifierArtifact(value));
  }

  get featureCount(): number {
    return this.document.featureCount;
  }

  get modelType(): ArtifactDocument['modelType'] {
    return this.document.modelType;
  }

  get version(): string {
    return this.document.version;
  }

  /**
   * Per-class probabilities for a vector of exactly `featureCount` values
   */
  predictProba(values: readonly number[]): ClassProbabilities {
    if (values.length !== this.document.featureCount) {
      throw new RangeError(`Expected ${this.document.featureCount} features, received ${values.length}`);
    }

    const positive = this.document.modelType === 'logistic_regression'
      ? this.logisticPositive(this.document, values)
      : this.forestPositive(this.document, values);

    return [1 - positive, positive];
  }

  private logisticPositive(model: LogisticRegressionDocument, values: readonly number[]): number {
    let z = model.intercept;
    for (let i = 0; i < values.length; i++) {
      z += model.coefficients[i] * values[i];
    }
    return 1 / (1 + Math.exp(-z));
  }

  private forestPositive(model: RandomForestDocument, values: readonly number[]): number {
    let total = 0;
    for (const tree of model.trees) {
      let node = tree.nodes[0];
      while (!isLeaf(node)) {
        node = tree.nodes[values[node.feature] <= node.threshold ? node.left : node.right];
      }
      total += node.value[1] / (node.value[0] + node.value[1]);
    }
    return total / model.trees.length;
  }
}

/**
 * Statistical Scorer
 *
 * Bag-of-words logistic regression predicting the probability that a
 * requirement is unclear, plus the words in the text that drove it.
 *
 * Training happens once per analyzer on a small labeled corpus
 * (data/training-corpus.json by default). The fit is full-batch gradient
 * descent from zero weights with L2 regularisation; there is no randomness,
 * so the same corpus always yields the same weights.
 */

import {
  type ClassifierResult,
  type RankedWord,
  type TrainingExample,
  TrainingCorpusSchema,
} from '../types/index.js';
import { readDataFile } from '../utils/data-files.js';
import { InitializationError } from '../utils/errors.js';
import type { Tokenizer } from './tokenizer.js';

export const DEFAULT_CORPUS_FILE = 'training-corpus.json';

export interface TrainingOptions {
  learningRate?: number | undefined;
  /** L2 penalty on the weights (not the bias) */
  l2?: number | undefined;
  maxIterations?: number | undefined;
  /** Stop once the gradient norm drops below this */
  tolerance?: number | undefined;
}

const DEFAULT_TRAINING = {
  learningRate: 0.5,
  l2: 0.01,
  maxIterations: 3000,
  tolerance: 1e-6,
} as const;

/**
 * Trained model state. Read-only after training.
 */
export interface TrainedClassifier {
  /** term → feature index */
  readonly vocabulary: ReadonlyMap<string, number>;
  readonly weights: readonly number[];
  readonly bias: number;
  readonly iterations: number;
  readonly exampleCount: number;
}

/** Sparse count vector: feature index → count */
type FeatureCounts = Map<number, number>;

export function loadDefaultCorpus(): TrainingExample[] {
  return validateCorpus(readDataFile(DEFAULT_CORPUS_FILE));
}

function validateCorpus(corpus: unknown): TrainingExample[] {
  const parsed = TrainingCorpusSchema.safeParse(corpus);
  if (!parsed.success) {
    throw new InitializationError('classifier', 'training corpus is malformed', {
      details: { issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
    });
  }
  return parsed.data;
}

function sigmoid(z: number): number {
  if (z >= 0) {
    return 1 / (1 + Math.exp(-z));
  }
  const e = Math.exp(z);
  return e / (1 + e);
}

function terms(text: string, tokenizer: Tokenizer): string[] {
  return tokenizer.tokenize(text).map((token) => token.toLowerCase());
}

function vectorize(tokens: readonly string[], vocabulary: ReadonlyMap<string, number>): FeatureCounts {
  const counts: FeatureCounts = new Map();
  for (const token of tokens) {
    const index = vocabulary.get(token);
    if (index !== undefined) {
      counts.set(index, (counts.get(index) ?? 0) + 1);
    }
  }
  return counts;
}

function linear(counts: FeatureCounts, weights: readonly number[], bias: number): number {
  let z = bias;
  for (const [index, count] of counts) {
    z += (weights[index] ?? 0) * count;
  }
  return z;
}

/**
 * Fit the classifier on a labeled corpus.
 *
 * @throws {InitializationError} for an empty or single-class corpus, or one
 *   whose sentences yield no tokens
 */
export function trainClassifier(
  corpus: readonly TrainingExample[],
  tokenizer: Tokenizer,
  options: TrainingOptions = {}
): TrainedClassifier {
  const examples = validateCorpus(corpus);
  if (examples.length === 0) {
    throw new InitializationError('classifier', 'training corpus is empty');
  }

  const labels = new Set(examples.map((e) => e.label));
  if (labels.size < 2) {
    throw new InitializationError('classifier', 'training corpus contains a single class', {
      details: { labels: [...labels] },
    });
  }

  // Vocabulary in first-seen order
  const vocabulary = new Map<string, number>();
  const tokenized = examples.map((example) => terms(example.text, tokenizer));
  for (const tokens of tokenized) {
    for (const token of tokens) {
      if (!vocabulary.has(token)) {
        vocabulary.set(token, vocabulary.size);
      }
    }
  }
  if (vocabulary.size === 0) {
    throw new InitializationError('classifier', 'training corpus produced an empty vocabulary', {
      details: { tokenizer: tokenizer.name },
    });
  }

  const rows = tokenized.map((tokens) => vectorize(tokens, vocabulary));
  const targets = examples.map((e) => e.label);
  const settings = {
    learningRate: options.learningRate ?? DEFAULT_TRAINING.learningRate,
    l2: options.l2 ?? DEFAULT_TRAINING.l2,
    maxIterations: options.maxIterations ?? DEFAULT_TRAINING.maxIterations,
    tolerance: options.tolerance ?? DEFAULT_TRAINING.tolerance,
  };

  const n = rows.length;
  const weights = new Array<number>(vocabulary.size).fill(0);
  let bias = 0;
  let iterations = 0;

  while (iterations < settings.maxIterations) {
    const gradient = weights.map((w) => settings.l2 * w);
    let biasGradient = 0;

    rows.forEach((row, i) => {
      const error = (sigmoid(linear(row, weights, bias)) - (targets[i] ?? 0)) / n;
      biasGradient += error;
      for (const [index, count] of row) {
        gradient[index] = (gradient[index] ?? 0) + error * count;
      }
    });

    const norm = Math.sqrt(gradient.reduce((sum, g) => sum + g * g, biasGradient * biasGradient));
    if (norm < settings.tolerance) {
      break;
    }

    for (let j = 0; j < weights.length; j++) {
      weights[j] = (weights[j] ?? 0) - settings.learningRate * (gradient[j] ?? 0);
    }
    bias -= settings.learningRate * biasGradient;
    iterations++;
  }

  return Object.freeze({
    vocabulary,
    weights: Object.freeze(weights),
    bias,
    iterations,
    exampleCount: n,
  });
}

/**
 * Probability that the text is unclear, and the top-K in-vocabulary words of
 * the text ranked by the magnitude of their trained weight.
 * Out-of-vocabulary words contribute nothing.
 */
export function score(
  classifier: TrainedClassifier,
  tokenizer: Tokenizer,
  text: string,
  topK: number
): ClassifierResult {
  const tokens = terms(text, tokenizer);
  const counts = vectorize(tokens, classifier.vocabulary);
  const probability = sigmoid(linear(counts, classifier.weights, classifier.bias));

  const rankedWords: RankedWord[] = [];
  for (const word of new Set(tokens)) {
    const index = classifier.vocabulary.get(word);
    const weight = index === undefined ? 0 : (classifier.weights[index] ?? 0);
    if (weight !== 0) {
      rankedWords.push({ word, weight });
    }
  }

  // Ties: code-unit order
  rankedWords.sort(
    (a, b) =>
      Math.abs(b.weight) - Math.abs(a.weight) || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0)
  );

  return {
    probability,
    rankedWords: rankedWords.slice(0, topK),
  };
}

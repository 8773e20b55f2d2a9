/**
 * Requirement clarity analyzer
 *
 * Entry points of the analysis core:
 * - initialize: builds the lexicon, prepares the tokenizer and trains the
 *   classifier, once, into a read-only handle
 * - analyze: one statement → one frozen Verdict
 * - analyzeBatch: many statements, order-preserving, failures kept per statement
 *
 * Several handles with different configuration can coexist; nothing here is
 * process-global.
 */

import {
  type ClassifierResult,
  type Reason,
  type ThresholdOverrides,
  type Thresholds,
  type TrainingExample,
  type LexiconOverrides,
  type Verdict,
  DEFAULT_THRESHOLDS,
  ThresholdOverridesSchema,
} from '../types/index.js';
import { InitializationError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { formatExplanation } from './explainability.js';
import { type Lexicon, createLexicon } from './lexicon.js';
import { analyzeRules } from './rule-engine.js';
import {
  type TrainedClassifier,
  type TrainingOptions,
  loadDefaultCorpus,
  score,
  trainClassifier,
} from './statistical-scorer.js';
import { type Tokenizer, prepareTokenizer, wordTokenizer } from './tokenizer.js';
import { aggregate, deriveOutcome } from './verdict-aggregator.js';

export interface AnalyzerConfig {
  /** Training corpus; defaults to data/training-corpus.json */
  corpus?: readonly TrainingExample[] | undefined;
  lexicon?: LexiconOverrides | undefined;
  tokenizer?: Tokenizer | undefined;
  /** Use whitespace tokenization, with a warning, if the tokenizer cannot be prepared */
  allowTokenizerFallback?: boolean | undefined;
  /** Defaults for every analysis made with this handle */
  thresholds?: ThresholdOverrides | undefined;
  training?: TrainingOptions | undefined;
}

export interface AnalyzerHandle {
  readonly lexicon: Lexicon;
  readonly tokenizer: Tokenizer;
  readonly classifier: TrainedClassifier;
  readonly thresholds: Readonly<Thresholds>;
  /** Degradations found during setup, repeated on every verdict */
  readonly warnings: readonly string[];
  readonly initializedAt: string;
}

/**
 * Apply per-call overrides on top of base thresholds.
 *
 * @throws {ValidationError} when an override is out of range
 */
export function resolveThresholds(base: Readonly<Thresholds>, overrides?: ThresholdOverrides): Thresholds {
  const parsed = ThresholdOverridesSchema.safeParse(overrides ?? {});
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error);
  }
  return {
    maxTokens: parsed.data.maxTokens ?? base.maxTokens,
    mlThreshold: parsed.data.mlThreshold ?? base.mlThreshold,
    topK: parsed.data.topK ?? base.topK,
  };
}

/**
 * Build an analyzer handle.
 *
 * @throws {InitializationError} when the tokenizer cannot be prepared (and no
 *   fallback is allowed), the corpus is degenerate, or configuration is invalid
 */
export async function initialize(config: AnalyzerConfig = {}): Promise<AnalyzerHandle> {
  const lexicon = createLexicon(config.lexicon);

  let thresholds: Thresholds;
  try {
    thresholds = resolveThresholds(DEFAULT_THRESHOLDS, config.thresholds);
  } catch (error) {
    throw new InitializationError('thresholds', error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }

  const prepared = await prepareTokenizer(config.tokenizer ?? wordTokenizer, {
    allowFallback: config.allowTokenizerFallback,
  });

  const corpus = config.corpus ?? loadDefaultCorpus();
  const classifier = trainClassifier(corpus, prepared.tokenizer, config.training);

  logger.info('Analyzer initialized', {
    tokenizer: prepared.tokenizer.name,
    examples: classifier.exampleCount,
    vocabularySize: classifier.vocabulary.size,
    trainingIterations: classifier.iterations,
  });

  return Object.freeze({
    lexicon,
    tokenizer: prepared.tokenizer,
    classifier,
    thresholds: Object.freeze(thresholds),
    warnings: Object.freeze(prepared.degradation ? [prepared.degradation] : []),
    initializedAt: new Date().toISOString(),
  });
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function verdictFor(
  handle: AnalyzerHandle,
  text: string,
  thresholds: Thresholds,
  parts: Pick<Verdict, 'vagueMatches' | 'hasConstraint' | 'tokenCount' | 'classifier'> & {
    reasons: Reason[];
  }
): Verdict {
  return deepFreeze({
    text,
    ...deriveOutcome(parts.reasons.length),
    reasons: parts.reasons,
    tags: parts.reasons.map((r) => r.tag),
    vagueMatches: parts.vagueMatches,
    hasConstraint: parts.hasConstraint,
    tokenCount: parts.tokenCount,
    classifier: parts.classifier,
    explanation: formatExplanation(parts.classifier, parts.vagueMatches),
    thresholds,
    warnings: [...handle.warnings],
  });
}

function runPipeline(handle: AnalyzerHandle, text: string, thresholds: Thresholds): Verdict {
  if (text.trim().length === 0) {
    return verdictFor(handle, text, thresholds, {
      vagueMatches: [],
      hasConstraint: false,
      tokenCount: 0,
      classifier: score(handle.classifier, handle.tokenizer, text, thresholds.topK),
      reasons: [{ tag: 'EMPTY_INPUT', message: 'Empty requirement: nothing to analyze.' }],
    });
  }

  const findings = analyzeRules(text, handle.lexicon, handle.tokenizer, thresholds.maxTokens);
  const classifierResult = score(handle.classifier, handle.tokenizer, text, thresholds.topK);
  const { reasons } = aggregate(findings, classifierResult, thresholds);

  return verdictFor(handle, text, thresholds, {
    vagueMatches: findings.vagueMatches,
    hasConstraint: findings.hasConstraint,
    tokenCount: findings.tokenCount,
    classifier: classifierResult,
    reasons,
  });
}

function analyzeResolved(handle: AnalyzerHandle, text: string, thresholds: Thresholds): Verdict {
  try {
    return runPipeline(handle, text, thresholds);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Requirement analysis failed', error, { textLength: text.length });

    const classifier: ClassifierResult = { probability: 0, rankedWords: [] };
    return verdictFor(handle, text, thresholds, {
      vagueMatches: [],
      hasConstraint: false,
      tokenCount: 0,
      classifier,
      reasons: [{ tag: 'ANALYSIS_FAILED', message: `Analysis failed: ${message}` }],
    });
  }
}

/**
 * Analyze one requirement statement.
 *
 * Empty input and failures inside the pipeline come back as verdicts
 * (EMPTY_INPUT, ANALYSIS_FAILED); only invalid overrides throw.
 *
 * @throws {ValidationError} when an override is out of range
 */
export function analyze(handle: AnalyzerHandle, text: string, overrides?: ThresholdOverrides): Verdict {
  return analyzeResolved(handle, text, resolveThresholds(handle.thresholds, overrides));
}

/**
 * Analyze many statements with the same overrides. The output has one verdict
 * per input, in input order.
 */
export function analyzeBatch(
  handle: AnalyzerHandle,
  texts: readonly string[],
  overrides?: ThresholdOverrides
): Verdict[] {
  const thresholds = resolveThresholds(handle.thresholds, overrides);
  return texts.map((text) => analyzeResolved(handle, text, thresholds));
}

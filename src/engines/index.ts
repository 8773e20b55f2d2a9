/**
 * Engines Index
 *
 * Exports the analysis core and the rewrite assistant.
 */

// Analyzer entry points
export {
  initialize,
  analyze,
  analyzeBatch,
  resolveThresholds,
  type AnalyzerConfig,
  type AnalyzerHandle,
} from './analyzer.js';

// Lexicon Store
export { createLexicon, DEFAULT_LEXICON_FILE, type Lexicon } from './lexicon.js';

// Tokenization
export {
  wordTokenizer,
  whitespaceTokenizer,
  prepareTokenizer,
  type Tokenizer,
  type PreparedTokenizer,
} from './tokenizer.js';

// Rule Engine
export { analyzeRules } from './rule-engine.js';

// Statistical Scorer
export {
  trainClassifier,
  score,
  loadDefaultCorpus,
  DEFAULT_CORPUS_FILE,
  type TrainedClassifier,
  type TrainingOptions,
} from './statistical-scorer.js';

// Verdict Aggregator
export { aggregate, deriveOutcome, type Outcome } from './verdict-aggregator.js';

// Explainability Formatter
export {
  formatExplanation,
  highlightVagueTerms,
  toExportRow,
  STATUS_LABELS,
  EXPORT_COLUMNS,
} from './explainability.js';

// Rewrite Assistant
export {
  suggestRewrite,
  buildRationale,
  runAssist,
  PLACEHOLDER_NOTE,
  type AssistResult,
  type AssistIteration,
  type AssistOptions,
} from './rewrite-assistant.js';

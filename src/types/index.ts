/**
 * reqclarity Type Definitions
 *
 * Central export for all types used across the system.
 */

// Verdict and pipeline types
export {
  type ReasonTag,
  type Reason,
  type ClarityStatus,
  type Severity,
  type TextSpan,
  type VagueTermMatch,
  type RankedWord,
  type ClassifierResult,
  type RuleFindings,
  type Thresholds,
  type ThresholdOverrides,
  type WordWeight,
  type Highlight,
  type Explanation,
  type Verdict,
  type ExportRow,
  ReasonTagSchema,
  ReasonSchema,
  ClarityStatusSchema,
  SeveritySchema,
  TextSpanSchema,
  VagueTermMatchSchema,
  RankedWordSchema,
  ClassifierResultSchema,
  ThresholdsSchema,
  ThresholdOverridesSchema,
  WordWeightSchema,
  HighlightSchema,
  ExplanationSchema,
  VerdictSchema,
  DEFAULT_THRESHOLDS,
} from './verdict.js';

// Data files, tool inputs and stored records
export {
  type TrainingExample,
  type LexiconData,
  type LexiconOverrides,
  type HighlightStyle,
  type AnalyzeInput,
  type BatchInput,
  type ExportFormat,
  type ExportInput,
  type AssistInput,
  type HistoryInput,
  type AnalysisRecord,
  TrainingExampleSchema,
  TrainingCorpusSchema,
  LexiconDataSchema,
  LexiconOverridesSchema,
  HighlightStyleSchema,
  AnalyzeInputSchema,
  BatchInputSchema,
  ExportFormatSchema,
  ExportInputSchema,
  AssistInputSchema,
  HistoryInputSchema,
  AnalysisRecordSchema,
} from './analysis.js';

import { z } from 'zod';

/**
 * Reason categories, in the order the aggregator emits them.
 * EMPTY_INPUT and ANALYSIS_FAILED replace the normal findings for one statement.
 */
export const ReasonTagSchema = z.enum([
  'VAGUE_TERMS',
  'NO_CONSTRAINTS',
  'COMPLEX_SENTENCE',
  'ML_AMBIGUITY',
  'EMPTY_INPUT',
  'ANALYSIS_FAILED',
]);

export type ReasonTag = z.infer<typeof ReasonTagSchema>;

export const ReasonSchema = z.object({
  tag: ReasonTagSchema,
  message: z.string(),
});

export type Reason = z.infer<typeof ReasonSchema>;

/**
 * Clarity grade: 0 reasons → Clear, 1 → PartiallyClear, 2+ → Unclear
 */
export const ClarityStatusSchema = z.enum(['Clear', 'PartiallyClear', 'Unclear']);

export type ClarityStatus = z.infer<typeof ClarityStatusSchema>;

export const SeveritySchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

export type Severity = z.infer<typeof SeveritySchema>;

/**
 * Offsets into the analyzed text (UTF-16 code units, end exclusive)
 */
export const TextSpanSchema = z.object({
  start: z.number().int().min(0),
  end: z.number().int().min(0),
});

export type TextSpan = z.infer<typeof TextSpanSchema>;

/**
 * A lexicon term found in the text. One entry per distinct term; every
 * occurrence is kept as a span for highlighting.
 */
export const VagueTermMatchSchema = z.object({
  term: z.string(),
  spans: z.array(TextSpanSchema),
});

export type VagueTermMatch = z.infer<typeof VagueTermMatchSchema>;

export const RankedWordSchema = z.object({
  word: z.string(),
  weight: z.number(),
});

export type RankedWord = z.infer<typeof RankedWordSchema>;

export const ClassifierResultSchema = z.object({
  probability: z.number().min(0).max(1),
  rankedWords: z.array(RankedWordSchema),
});

export type ClassifierResult = z.infer<typeof ClassifierResultSchema>;

/**
 * Output of the rule engine for one statement
 */
export interface RuleFindings {
  vagueMatches: VagueTermMatch[];
  hasConstraint: boolean;
  isComplex: boolean;
  tokenCount: number;
}

/**
 * Tunable analysis thresholds (the presentation layer's sensitivity sliders)
 */
export const ThresholdsSchema = z.object({
  maxTokens: z.number().int().min(1).default(20),
  mlThreshold: z.number().min(0).max(1).default(0.6),
  topK: z.number().int().min(0).default(5),
});

export type Thresholds = z.infer<typeof ThresholdsSchema>;

export const ThresholdOverridesSchema = z.object({
  maxTokens: z.number().int().min(1).optional(),
  mlThreshold: z.number().min(0).max(1).optional(),
  topK: z.number().int().min(0).optional(),
});

export type ThresholdOverrides = z.infer<typeof ThresholdOverridesSchema>;

export const DEFAULT_THRESHOLDS: Thresholds = ThresholdsSchema.parse({});

export const WordWeightSchema = z.object({
  word: z.string(),
  weight: z.number(),
  direction: z.enum(['unclear', 'clear']),
});

export type WordWeight = z.infer<typeof WordWeightSchema>;

export const HighlightSchema = z.object({
  term: z.string(),
  start: z.number().int().min(0),
  end: z.number().int().min(0),
});

export type Highlight = z.infer<typeof HighlightSchema>;

/**
 * Presentation-agnostic explainability data
 */
export const ExplanationSchema = z.object({
  wordWeights: z.array(WordWeightSchema),
  highlights: z.array(HighlightSchema),
});

export type Explanation = z.infer<typeof ExplanationSchema>;

/**
 * The terminal artifact of one analysis. Frozen after construction.
 */
export const VerdictSchema = z.object({
  text: z.string(),
  status: ClarityStatusSchema,
  severity: SeveritySchema,
  reasons: z.array(ReasonSchema),
  tags: z.array(ReasonTagSchema),
  vagueMatches: z.array(VagueTermMatchSchema),
  hasConstraint: z.boolean(),
  tokenCount: z.number().int().min(0),
  classifier: ClassifierResultSchema,
  explanation: ExplanationSchema,
  thresholds: ThresholdsSchema,
  warnings: z.array(z.string()),
});

export type Verdict = z.infer<typeof VerdictSchema>;

/**
 * Flat tabular projection of a verdict, one column per field
 */
export interface ExportRow {
  Requirement: string;
  Status: string;
  Severity: number;
  Tags: string;
  Reasons: string;
}

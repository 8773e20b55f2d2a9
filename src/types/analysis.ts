import { z } from 'zod';
import { ReasonTagSchema, ClarityStatusSchema, SeveritySchema } from './verdict.js';

// =============================================================================
// Analyzer data files
// =============================================================================

/**
 * One labeled sentence of the classifier's training corpus (1 = unclear)
 */
export const TrainingExampleSchema = z.object({
  text: z.string().min(1),
  label: z.union([z.literal(0), z.literal(1)]),
});

export type TrainingExample = z.infer<typeof TrainingExampleSchema>;

export const TrainingCorpusSchema = z.array(TrainingExampleSchema);

/**
 * Contents of data/lexicon.json, or a caller-supplied override
 */
export const LexiconDataSchema = z.object({
  vagueTerms: z.array(z.string().trim().min(1)),
  units: z.array(z.string().trim().min(1)).min(1),
  suggestions: z.record(z.string(), z.string()).default({}),
});

export type LexiconData = z.infer<typeof LexiconDataSchema>;

export const LexiconOverridesSchema = LexiconDataSchema.partial();

export type LexiconOverrides = z.infer<typeof LexiconOverridesSchema>;

// =============================================================================
// Tool inputs
// =============================================================================

const thresholdFields = {
  maxTokens: z.number().int().min(1).optional(),
  mlThreshold: z.number().min(0).max(1).optional(),
  topK: z.number().int().min(0).max(50).optional(),
};

export const HighlightStyleSchema = z.enum(['bold', 'color']);

export type HighlightStyle = z.infer<typeof HighlightStyleSchema>;

export const AnalyzeInputSchema = z.object({
  text: z.string().max(10000),
  ...thresholdFields,
  record: z.boolean().default(true),
  highlightStyle: HighlightStyleSchema.default('bold'),
});

export type AnalyzeInput = z.infer<typeof AnalyzeInputSchema>;

/**
 * Batch statements come either as an array or as one-per-line content
 */
const BatchSourceSchema = z.object({
  texts: z.array(z.string().max(10000)).max(1000).optional(),
  content: z.string().max(1_000_000).optional(),
});

export const BatchInputSchema = BatchSourceSchema.extend({
  ...thresholdFields,
  record: z.boolean().default(true),
});

export type BatchInput = z.infer<typeof BatchInputSchema>;

export const ExportFormatSchema = z.enum(['csv', 'json', 'yaml']);

export type ExportFormat = z.infer<typeof ExportFormatSchema>;

export const ExportInputSchema = BatchSourceSchema.extend({
  ...thresholdFields,
  format: ExportFormatSchema.default('csv'),
});

export type ExportInput = z.infer<typeof ExportInputSchema>;

export const AssistInputSchema = z.object({
  text: z.string().max(10000),
  ...thresholdFields,
  maxIterations: z.number().int().min(1).max(10).default(3),
});

export type AssistInput = z.infer<typeof AssistInputSchema>;

export const HistoryInputSchema = z.object({
  action: z.enum(['list', 'clear']).default('list'),
  limit: z.number().int().min(1).max(100).default(5),
});

export type HistoryInput = z.infer<typeof HistoryInputSchema>;

// =============================================================================
// Stored records
// =============================================================================

/**
 * A recorded analysis, as kept in the history table
 */
export const AnalysisRecordSchema = z.object({
  id: z.string(),
  text: z.string(),
  status: ClarityStatusSchema,
  severity: SeveritySchema,
  tags: z.array(ReasonTagSchema),
  reasons: z.array(z.string()),
  createdAt: z.string(),
});

export type AnalysisRecord = z.infer<typeof AnalysisRecordSchema>;

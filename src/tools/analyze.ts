import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Services } from '../services/index.js';
import { createAnalysisRecord } from '../storage/index.js';
import { analyze } from '../engines/analyzer.js';
import { STATUS_LABELS, highlightVagueTerms } from '../engines/explainability.js';
import { AnalyzeInputSchema, type ThresholdOverrides, type Verdict } from '../types/index.js';
import { logger } from '../utils/logger.js';

/** JSON Schema fragment shared by every tool that accepts threshold overrides */
export const thresholdProperties = {
  maxTokens: {
    type: 'integer',
    minimum: 1,
    description: 'Token count above which a requirement is flagged as complex (default: 20)',
  },
  mlThreshold: {
    type: 'number',
    minimum: 0,
    maximum: 1,
    description: 'Classifier probability above which ambiguity is flagged (default: 0.6)',
  },
  topK: {
    type: 'integer',
    minimum: 0,
    maximum: 50,
    description: 'Number of influential words to report (default: 5)',
  },
} as const;

export function pickOverrides(input: {
  maxTokens?: number | undefined;
  mlThreshold?: number | undefined;
  topK?: number | undefined;
}): ThresholdOverrides {
  return { maxTokens: input.maxTokens, mlThreshold: input.mlThreshold, topK: input.topK };
}

/**
 * reqclarity_analyze - Grade one requirement statement
 */
export const analyzeTool: Tool = {
  name: 'reqclarity_analyze',
  description: `Analyze the clarity of a single software requirement.

Checks for:
- Vague or subjective terms ("fast", "user-friendly", "scalable")
- Missing measurable constraints (a number with a unit, such as "2 seconds" or "500 users")
- Overly long sentences
- Wording a small classifier associates with ambiguous requirements

Returns a verdict (Clear, PartiallyClear or Unclear, severity 1-3) with one reason per
problem, the words that drove the classifier, and the requirement with vague terms highlighted.

## Example

\`\`\`json
{ "text": "The system shall respond in under 2 seconds." }
\`\`\``,

  inputSchema: {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'Requirement statement to analyze',
      },
      ...thresholdProperties,
      record: {
        type: 'boolean',
        description: 'Keep the result in the analysis history (default: true)',
        default: true,
      },
      highlightStyle: {
        type: 'string',
        enum: ['bold', 'color'],
        description: 'Markdown used to highlight vague terms (default: bold)',
      },
    },
    required: ['text'],
  },
};

export interface AnalyzeResult {
  id: string | undefined;
  statusLabel: string;
  highlighted: string;
  verdict: Verdict;
}

/**
 * Handle a single analysis
 */
export function handleAnalyze(
  args: Record<string, unknown>,
  services: Pick<Services, 'storage' | 'analyzer'>
): AnalyzeResult {
  const input = AnalyzeInputSchema.parse(args);
  const verdict = analyze(services.analyzer, input.text, pickOverrides(input));

  let id: string | undefined;
  if (input.record) {
    const record = createAnalysisRecord(verdict);
    services.storage.saveAnalysis(record);
    id = record.id;
    logger.updateContext({ analysisId: id });
  }

  logger.info('Requirement analyzed', {
    status: verdict.status,
    severity: verdict.severity,
    tags: verdict.tags,
  });

  return {
    id,
    statusLabel: STATUS_LABELS[verdict.status],
    highlighted: highlightVagueTerms(verdict.text, verdict.explanation.highlights, input.highlightStyle),
    verdict,
  };
}

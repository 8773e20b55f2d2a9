import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Services } from '../services/index.js';
import { createAnalysisRecord } from '../storage/index.js';
import { analyzeBatch } from '../engines/analyzer.js';
import { BatchInputSchema, type ClarityStatus, type Verdict } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { pickOverrides, thresholdProperties } from './analyze.js';

export const statementSourceProperties = {
  texts: {
    type: 'array',
    items: { type: 'string' },
    description: 'Requirement statements, one per entry',
  },
  content: {
    type: 'string',
    description: 'Requirements document with one statement per line; blank lines are skipped',
  },
} as const;

/**
 * Statements from either `texts` or one-per-line `content`, never both
 */
export function collectStatements(input: { texts?: string[] | undefined; content?: string | undefined }): string[] {
  if (input.texts !== undefined && input.content !== undefined) {
    throw new ValidationError('Provide either texts or content, not both');
  }
  if (input.texts !== undefined) {
    return input.texts;
  }
  if (input.content !== undefined) {
    return input.content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }
  throw new ValidationError('Either texts or content is required');
}

/**
 * reqclarity_batch - Grade many requirement statements at once
 */
export const batchTool: Tool = {
  name: 'reqclarity_batch',
  description: `Analyze many requirements with the same thresholds.

Pass either an array of statements or a document with one requirement per line.
Returns one verdict per statement, in input order, plus a count per status.
A statement that fails to analyze gets an ANALYSIS_FAILED verdict; the rest still run.

## Example

\`\`\`json
{ "content": "The system shall be fast.\\nThe API shall respond within 200 ms." }
\`\`\``,

  inputSchema: {
    type: 'object',
    properties: {
      ...statementSourceProperties,
      ...thresholdProperties,
      record: {
        type: 'boolean',
        description: 'Keep every result in the analysis history (default: true)',
        default: true,
      },
    },
  },
};

export type StatusSummary = Record<ClarityStatus, number> & { total: number };

export interface BatchResult {
  summary: StatusSummary;
  results: Array<{ id: string | undefined; verdict: Verdict }>;
}

export function summarize(verdicts: readonly Verdict[]): StatusSummary {
  const summary: StatusSummary = { total: verdicts.length, Clear: 0, PartiallyClear: 0, Unclear: 0 };
  for (const verdict of verdicts) {
    summary[verdict.status]++;
  }
  return summary;
}

export function handleBatch(
  args: Record<string, unknown>,
  services: Pick<Services, 'storage' | 'analyzer'>
): BatchResult {
  const input = BatchInputSchema.parse(args);
  const statements = collectStatements(input);
  const verdicts = analyzeBatch(services.analyzer, statements, pickOverrides(input));

  const records = input.record ? verdicts.map(createAnalysisRecord) : [];
  services.storage.saveAnalyses(records);

  const results = verdicts.map((verdict, index) => ({ id: records[index]?.id, verdict }));

  const summary = summarize(verdicts);
  logger.info('Batch analyzed', { ...summary });

  return { summary, results };
}

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Storage } from '../storage/index.js';
import { type AnalysisRecord, HistoryInputSchema } from '../types/index.js';
import { logger } from '../utils/logger.js';

/**
 * reqclarity_history - Recent analyses
 */
export const historyTool: Tool = {
  name: 'reqclarity_history',
  description: `List or clear the analysis history.

## Actions

- **list** - Most recent analyses first (default, up to \`limit\`)
- **clear** - Delete the whole history

Each entry can also be read as the resource reqclarity://analyses/{id}.`,

  inputSchema: {
    type: 'object',
    properties: {
      action: {
        type: 'string',
        enum: ['list', 'clear'],
        description: 'What to do (default: list)',
      },
      limit: {
        type: 'integer',
        minimum: 1,
        maximum: 100,
        description: 'Number of analyses to list (default: 5)',
      },
    },
  },
};

export type HistoryResult =
  | { action: 'list'; count: number; analyses: AnalysisRecord[] }
  | { action: 'clear'; removed: number };

export function handleHistory(args: Record<string, unknown>, storage: Storage): HistoryResult {
  const input = HistoryInputSchema.parse(args);

  if (input.action === 'clear') {
    const removed = storage.clearAnalyses();
    logger.info('Analysis history cleared', { removed });
    return { action: 'clear', removed };
  }

  const analyses = storage.listRecent(input.limit);
  return { action: 'list', count: analyses.length, analyses };
}

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Services } from '../services/index.js';
import { type AssistResult, runAssist } from '../engines/rewrite-assistant.js';
import { AssistInputSchema } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { pickOverrides, thresholdProperties } from './analyze.js';

/**
 * reqclarity_assist - Suggest a clearer rewrite of a requirement
 */
export const assistTool: Tool = {
  name: 'reqclarity_assist',
  description: `Suggest a clearer rewrite of a requirement.

Vague terms are replaced with concrete, measurable wording and a placeholder target is
added when no constraint is present. Each rewrite is analyzed again until it is clear,
stops changing, or maxIterations is reached.

The suggested numbers are placeholders: confirm the real targets with stakeholders.

## Example

\`\`\`json
{ "text": "The UI should be user-friendly.", "maxIterations": 3 }
\`\`\``,

  inputSchema: {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'Requirement statement to improve',
      },
      maxIterations: {
        type: 'integer',
        minimum: 1,
        maximum: 10,
        description: 'Maximum number of rewrite rounds (default: 3)',
      },
      ...thresholdProperties,
    },
    required: ['text'],
  },
};

export function handleAssist(args: Record<string, unknown>, services: Pick<Services, 'analyzer'>): AssistResult {
  const input = AssistInputSchema.parse(args);
  const result = runAssist(services.analyzer, input.text, {
    maxIterations: input.maxIterations,
    overrides: pickOverrides(input),
  });

  logger.info('Rewrite suggested', {
    iterations: result.iterations.length,
    originalSeverity: result.original.severity,
    finalSeverity: result.finalVerdict.severity,
  });

  return result;
}

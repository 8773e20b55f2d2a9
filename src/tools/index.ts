import type { Tool, TextContent } from '@modelcontextprotocol/sdk/types.js';
import type { ServiceContainer } from '../services/index.js';
import { logger } from '../utils/logger.js';
import { classifyError, createErrorResponse, ReqClarityError, ErrorCode } from '../utils/errors.js';

// Analysis
import { analyzeTool, handleAnalyze } from './analyze.js';
import { batchTool, handleBatch } from './batch.js';
import { exportTool, handleExport } from './export.js';
import { assistTool, handleAssist } from './assist.js';

// History
import { historyTool, handleHistory } from './history.js';

// Ops tool
import { healthTool, handleHealth } from './health.js';

/**
 * Register all MCP tools
 *
 * - reqclarity_analyze: Grade one requirement
 * - reqclarity_batch: Grade many requirements
 * - reqclarity_export: Results table as CSV, JSON or YAML
 * - reqclarity_assist: Suggest a clearer rewrite
 * - reqclarity_history: List or clear recent analyses
 * - reqclarity_health: Health check
 */
export function registerTools(): Tool[] {
  return [
    // Analysis
    analyzeTool,
    batchTool,
    exportTool,
    assistTool,
    // History
    historyTool,
    // Ops
    healthTool,
  ];
}

const TOOL_NAMES = registerTools().map((tool) => tool.name);

/**
 * Validate that args is a proper object (not null, not array).
 */
function validateArgs(args: unknown): args is Record<string, unknown> {
  return args !== null && typeof args === 'object' && !Array.isArray(args);
}

function textContent(payload: unknown): { content: TextContent[] } {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/**
 * Handle tool calls with input validation, request tracking, and structured error responses.
 */
export async function handleToolCall(
  name: string,
  args: unknown,
  container: ServiceContainer
): Promise<{ content: TextContent[] }> {
  return logger.withRequestContext({ toolName: name }, async () => {
    const requestId = logger.getRequestId();

    try {
      if (!validateArgs(args)) {
        logger.warn('Invalid arguments received', undefined, {
          argType: typeof args,
          isNull: args === null,
          isArray: Array.isArray(args),
        });
        const invalidArgsError = new ReqClarityError('Arguments must be a non-null object', ErrorCode.INVALID_ARGUMENTS, {
          details: { received: typeof args },
        });
        return textContent(createErrorResponse(invalidArgsError, requestId));
      }

      logger.debug('Tool call started', undefined, {
        argKeys: Object.keys(args),
      });

      let result: unknown;

      switch (name) {
        // Analysis
        case 'reqclarity_analyze':
          result = handleAnalyze(args, await container.getAll());
          break;

        case 'reqclarity_batch':
          result = handleBatch(args, await container.getAll());
          break;

        case 'reqclarity_export':
          result = handleExport(args, { analyzer: await container.getAnalyzer() });
          break;

        case 'reqclarity_assist':
          result = handleAssist(args, { analyzer: await container.getAnalyzer() });
          break;

        // History
        case 'reqclarity_history':
          result = handleHistory(args, await container.getStorage());
          break;

        // Ops
        case 'reqclarity_health':
          result = await handleHealth(args, container);
          break;

        default:
          logger.warn('Unknown tool requested', undefined, { tool: name });
          throw new ReqClarityError(`Unknown tool: ${name}. Available: ${TOOL_NAMES.join(', ')}`, ErrorCode.UNKNOWN_TOOL);
      }

      const elapsedMs = logger.getElapsedMs();
      logger.debug('Tool call completed', undefined, { elapsedMs });

      return textContent(result);
    } catch (error) {
      const elapsedMs = logger.getElapsedMs();
      const classified = classifyError(error);

      logger.error('Tool call failed', error, {
        code: classified.code,
        httpStatus: classified.httpStatus,
        isRetryable: classified.isRetryable,
        elapsedMs,
      });

      return textContent(createErrorResponse(error, requestId));
    }
  });
}

/**
 * Structured logging utility for reqclarity
 * Provides context-aware logging with request ID tracking via AsyncLocalStorage
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log context that can be passed to any log method
 */
export interface LogContext {
  [key: string]: unknown;
}

/**
 * Request context stored in AsyncLocalStorage for tracking across async calls
 */
interface RequestContext {
  requestId: string;
  toolName?: string | undefined;
  analysisId?: string | undefined;
  startTime: number;
}

const requestStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Format: req-{8 chars of base64url}
 */
function generateRequestId(): string {
  return `req-${randomBytes(6).toString('base64url')}`;
}

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack,
    };
  }
  return { errorValue: String(error) };
}

/**
 * Format a log message with timestamp, level, request context, and optional data
 */
function formatMessage(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const reqContext = requestStorage.getStore();

  const fullContext: LogContext = {};

  if (reqContext) {
    fullContext['requestId'] = reqContext.requestId;
    if (reqContext.toolName) fullContext['tool'] = reqContext.toolName;
    if (reqContext.analysisId) fullContext['analysisId'] = reqContext.analysisId;
  }

  if (context) {
    Object.assign(fullContext, context);
  }

  const contextStr = Object.keys(fullContext).length > 0
    ? ` ${JSON.stringify(fullContext)}`
    : '';

  return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

function getElapsedMs(): number | undefined {
  const reqContext = requestStorage.getStore();
  return reqContext ? Date.now() - reqContext.startTime : undefined;
}

/** Set by {@link logger.useStderr}; the MCP stdio transport owns stdout. */
let stdoutReserved = false;

/**
 * Logger with support for structured context and request ID tracking.
 */
export const logger = {
  /**
   * Log a debug message (only when LOG_LEVEL=debug)
   */
  debug(message: string, error?: unknown, context?: LogContext): void {
    if (process.env['LOG_LEVEL'] === 'debug') {
      const fullContext = error ? { ...context, ...formatError(error) } : context;
      const line = formatMessage('debug', message, fullContext);
      if (stdoutReserved) {
        console.error(line);
      } else {
        console.debug(line);
      }
    }
  },

  info(message: string, context?: LogContext): void {
    const line = formatMessage('info', message, context);
    if (stdoutReserved) {
      console.error(line);
    } else {
      console.info(line);
    }
  },

  warn(message: string, error?: unknown, context?: LogContext): void {
    const fullContext = error ? { ...context, ...formatError(error) } : context;
    console.warn(formatMessage('warn', message, fullContext));
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    const fullContext = error ? { ...context, ...formatError(error) } : context;
    console.error(formatMessage('error', message, fullContext));
  },

  /**
   * Send debug and info lines to stderr as well. Called once by the stdio server.
   */
  useStderr(enabled = true): void {
    stdoutReserved = enabled;
  },

  /**
   * Run a function within a request context.
   * All logs within the callback will include the request ID and other context.
   *
   * @example
   * ```typescript
   * const result = await logger.withRequestContext(
   *   { toolName: 'reqclarity_analyze' },
   *   async () => {
   *     logger.info('Analyzing requirement'); // includes requestId and tool
   *     return analyze(handle, text);
   *   }
   * );
   * ```
   */
  async withRequestContext<T>(
    options: {
      requestId?: string | undefined;
      toolName?: string | undefined;
      analysisId?: string | undefined;
    },
    fn: () => Promise<T>
  ): Promise<T> {
    const context: RequestContext = {
      requestId: options.requestId ?? generateRequestId(),
      toolName: options.toolName,
      analysisId: options.analysisId,
      startTime: Date.now(),
    };

    return requestStorage.run(context, fn);
  },

  getRequestId(): string | undefined {
    return requestStorage.getStore()?.requestId;
  },

  getElapsedMs,

  /**
   * Update the current request context (e.g., to add analysisId once a record is saved)
   */
  updateContext(updates: Partial<Omit<RequestContext, 'requestId' | 'startTime'>>): void {
    const current = requestStorage.getStore();
    if (current) {
      if (updates.toolName !== undefined) current.toolName = updates.toolName;
      if (updates.analysisId !== undefined) current.analysisId = updates.analysisId;
    }
  },
};

export type Logger = typeof logger;

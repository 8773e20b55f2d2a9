import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { logger } from '../../src/utils/logger.js';

type ConsoleSpy = MockInstance<typeof console.info>;

/** The n-th line written through a console spy */
function line(spy: ConsoleSpy, index = 0): string {
  return String(spy.mock.calls.at(index)?.[0]);
}

describe('logger', () => {
  let consoleDebugSpy: ConsoleSpy;
  let consoleInfoSpy: ConsoleSpy;
  let consoleWarnSpy: ConsoleSpy;
  let consoleErrorSpy: ConsoleSpy;

  beforeEach(() => {
    consoleDebugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    consoleInfoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.useStderr(false);
    delete process.env['LOG_LEVEL'];
  });

  describe('basic logging', () => {
    it('should log info messages', () => {
      logger.info('Test message');
      expect(consoleInfoSpy).toHaveBeenCalledTimes(1);
      expect(line(consoleInfoSpy)).toContain('[INFO]');
      expect(line(consoleInfoSpy)).toContain('Test message');
    });

    it('should log warn messages', () => {
      logger.warn('Warning message');
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(line(consoleWarnSpy)).toContain('[WARN] Warning message');
    });

    it('should log error messages', () => {
      logger.error('Error message');
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(line(consoleErrorSpy)).toContain('[ERROR] Error message');
    });

    it('should not log debug messages by default', () => {
      logger.debug('Debug message');
      expect(consoleDebugSpy).not.toHaveBeenCalled();
    });

    it('should log debug messages when LOG_LEVEL=debug', () => {
      process.env['LOG_LEVEL'] = 'debug';
      logger.debug('Debug message');
      expect(consoleDebugSpy).toHaveBeenCalledTimes(1);
      expect(line(consoleDebugSpy)).toContain('[DEBUG]');
    });
  });

  describe('stdout reservation', () => {
    it('should move info lines to stderr once stdout is reserved', () => {
      logger.useStderr();
      logger.info('Server ready');
      expect(consoleInfoSpy).not.toHaveBeenCalled();
      expect(line(consoleErrorSpy)).toContain('[INFO] Server ready');
    });

    it('should move debug lines to stderr once stdout is reserved', () => {
      process.env['LOG_LEVEL'] = 'debug';
      logger.useStderr();
      logger.debug('Tokenizing');
      expect(consoleDebugSpy).not.toHaveBeenCalled();
      expect(line(consoleErrorSpy)).toContain('[DEBUG] Tokenizing');
    });
  });

  describe('context logging', () => {
    it('should include context in log message', () => {
      logger.info('Test message', { verdicts: 3, status: 'Clear' });
      expect(line(consoleInfoSpy)).toContain('"verdicts":3');
      expect(line(consoleInfoSpy)).toContain('"status":"Clear"');
    });

    it('should format error objects', () => {
      logger.error('Something failed', new Error('Test error'));
      const logOutput = line(consoleErrorSpy);
      expect(logOutput).toContain('"errorName":"Error"');
      expect(logOutput).toContain('"errorMessage":"Test error"');
      expect(logOutput).toContain('"errorStack"');
    });

    it('should handle non-Error error values', () => {
      logger.error('Something failed', 'string error');
      expect(line(consoleErrorSpy)).toContain('"errorValue":"string error"');
    });
  });

  describe('request context', () => {
    it('should include requestId in logs within context', async () => {
      await logger.withRequestContext({ toolName: 'test_tool' }, async () => {
        logger.info('Test message');
      });

      expect(line(consoleInfoSpy)).toContain('"requestId":"req-');
      expect(line(consoleInfoSpy)).toContain('"tool":"test_tool"');
    });

    it('should include custom requestId when provided', async () => {
      await logger.withRequestContext({ requestId: 'custom-req-123', toolName: 'test_tool' }, async () => {
        logger.info('Test message');
      });

      expect(line(consoleInfoSpy)).toContain('"requestId":"custom-req-123"');
    });

    it('should include analysisId when provided', async () => {
      await logger.withRequestContext({ toolName: 'test_tool', analysisId: 'analysis-456' }, async () => {
        logger.info('Test message');
      });

      expect(line(consoleInfoSpy)).toContain('"analysisId":"analysis-456"');
    });

    it('should return the result of the wrapped function', async () => {
      const result = await logger.withRequestContext({}, async () => 'test result');
      expect(result).toBe('test result');
    });

    it('should propagate errors from wrapped function', async () => {
      await expect(
        logger.withRequestContext({}, async () => {
          throw new Error('Test error');
        })
      ).rejects.toThrow('Test error');
    });

    it('should provide access to requestId via getRequestId', async () => {
      let capturedRequestId: string | undefined;

      await logger.withRequestContext({ requestId: 'test-req-id' }, async () => {
        capturedRequestId = logger.getRequestId();
      });

      expect(capturedRequestId).toBe('test-req-id');
    });

    it('should return undefined for getRequestId outside context', () => {
      expect(logger.getRequestId()).toBeUndefined();
    });

    it('should track elapsed time', async () => {
      let elapsedMs: number | undefined;

      await logger.withRequestContext({}, async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        elapsedMs = logger.getElapsedMs();
      });

      expect(elapsedMs).toBeGreaterThanOrEqual(9);
    });

    it('should allow updating context after creation', async () => {
      await logger.withRequestContext({ toolName: 'test_tool' }, async () => {
        logger.updateContext({ analysisId: 'analysis-added-later' });
        logger.info('After update');
      });

      expect(line(consoleInfoSpy)).toContain('"analysisId":"analysis-added-later"');
    });

    it('should not include context fields in logs outside request context', () => {
      logger.info('No context');
      expect(line(consoleInfoSpy)).not.toContain('requestId');
    });

    it('should handle nested request contexts', async () => {
      await logger.withRequestContext({ requestId: 'outer-req', toolName: 'outer_tool' }, async () => {
        await logger.withRequestContext({ requestId: 'inner-req', toolName: 'inner_tool' }, async () => {
          logger.info('Inner message');
        });
        logger.info('Outer message');
      });

      expect(line(consoleInfoSpy, 0)).toContain('"requestId":"inner-req"');
      expect(line(consoleInfoSpy, 0)).toContain('"tool":"inner_tool"');
      expect(line(consoleInfoSpy, 1)).toContain('"requestId":"outer-req"');
      expect(line(consoleInfoSpy, 1)).toContain('"tool":"outer_tool"');
    });
  });

  describe('timestamp format', () => {
    it('should include ISO timestamp', () => {
      logger.info('Test message');
      expect(line(consoleInfoSpy)).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\]/);
    });
  });

  describe('generated request IDs', () => {
    it('should generate unique request IDs', async () => {
      const requestIds: string[] = [];

      for (let i = 0; i < 10; i++) {
        await logger.withRequestContext({}, async () => {
          const id = logger.getRequestId();
          if (id) requestIds.push(id);
        });
      }

      expect(new Set(requestIds).size).toBe(10);
    });

    it('should generate request IDs with correct format', async () => {
      let id: string | undefined;
      await logger.withRequestContext({}, async () => {
        id = logger.getRequestId();
      });
      expect(id).toMatch(/^req-[A-Za-z0-9_-]{8}$/);
    });
  });
});

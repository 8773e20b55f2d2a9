import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ServiceContainer } from '../services/index.js';
import type { Storage } from '../storage/index.js';
import type { ClarityStatus, Thresholds } from '../types/index.js';
import { SERVER_VERSION } from '../version.js';

/**
 * Tool definition for health check
 */
export const healthTool: Tool = {
  name: 'reqclarity_health',
  description: `Check the health status of the reqclarity server.

Returns:
- Overall health status (healthy, degraded, unhealthy)
- Storage connectivity
- Analyzer status (tokenizer, training, fallback warnings)
- With verbose: history counts and classifier details
- Version information

Use this for monitoring and debugging the server.`,

  inputSchema: {
    type: 'object',
    properties: {
      verbose: {
        type: 'boolean',
        description: 'Include detailed metrics and diagnostics',
        default: false,
      },
    },
  },
};

/**
 * Health status levels
 */
type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

interface CheckResult {
  status: HealthStatus;
  message: string;
  latencyMs?: number;
}

/**
 * Health check result
 */
interface HealthResult {
  status: HealthStatus;
  timestamp: string;
  version: string;
  checks: {
    storage: CheckResult;
    analyzer: CheckResult & { warnings?: string[] };
  };
  metrics?: {
    analyses: {
      total: number;
      byStatus: Record<ClarityStatus, number>;
    };
    analyzer?: {
      tokenizer: string;
      trainingExamples: number;
      vocabularySize: number;
      trainingIterations: number;
      thresholds: Thresholds;
      initializedAt: string;
    };
  };
}

const SEVERITY: Record<HealthStatus, number> = { healthy: 0, degraded: 1, unhealthy: 2 };

function worst(...statuses: HealthStatus[]): HealthStatus {
  return statuses.reduce((a, b) => (SEVERITY[b] > SEVERITY[a] ? b : a), 'healthy');
}

/**
 * Handle health check request
 */
export async function handleHealth(
  args: Record<string, unknown>,
  container: ServiceContainer
): Promise<HealthResult> {
  const verbose = args['verbose'] === true;
  const timestamp = new Date().toISOString();

  let storage: Storage | undefined;
  let storageCheck: CheckResult;
  try {
    storage = await container.getStorage();
    storageCheck = checkStorage(storage);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown storage error';
    storageCheck = { status: 'unhealthy', message: `Storage error: ${message}` };
  }

  const analyzerCheck = await checkAnalyzer(container);

  const result: HealthResult = {
    status: worst(storageCheck.status, analyzerCheck.status),
    timestamp,
    version: SERVER_VERSION,
    checks: {
      storage: storageCheck,
      analyzer: analyzerCheck,
    },
  };

  // Add detailed metrics if verbose
  if (verbose && storage && storageCheck.status !== 'unhealthy') {
    result.metrics = await gatherMetrics(storage, container);
  }

  return result;
}

/**
 * Check storage connectivity and health
 */
function checkStorage(storage: Storage): CheckResult {
  const start = Date.now();

  try {
    storage.countAnalyses();
    const latencyMs = Date.now() - start;

    // Warn if latency is high
    if (latencyMs > 1000) {
      return {
        status: 'degraded',
        message: `Storage responding slowly (${latencyMs}ms)`,
        latencyMs,
      };
    }

    return {
      status: 'healthy',
      message: 'Storage is operational',
      latencyMs,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown storage error';
    return {
      status: 'unhealthy',
      message: `Storage error: ${message}`,
    };
  }
}

/**
 * Report the analyzer without forcing it to initialize
 */
async function checkAnalyzer(container: ServiceContainer): Promise<HealthResult['checks']['analyzer']> {
  const state = container.getAnalyzerState();

  switch (state) {
    case 'idle':
      return { status: 'healthy', message: 'Analyzer initializes on first analysis' };
    case 'initializing':
      return { status: 'healthy', message: 'Analyzer is initializing' };
    case 'failed':
      return {
        status: 'unhealthy',
        message: await container.getAnalyzer().then(
          () => 'Analyzer failed to initialize',
          (error: unknown) => `Analyzer failed to initialize: ${error instanceof Error ? error.message : String(error)}`
        ),
      };
    case 'ready': {
      const analyzer = await container.getAnalyzer();
      if (analyzer.warnings.length > 0) {
        return { status: 'degraded', message: 'Analyzer is running degraded', warnings: [...analyzer.warnings] };
      }
      return { status: 'healthy', message: 'Analyzer is ready' };
    }
  }
}

/**
 * Gather detailed metrics from storage and the analyzer
 */
async function gatherMetrics(
  storage: Storage,
  container: ServiceContainer
): Promise<NonNullable<HealthResult['metrics']>> {
  const metrics: NonNullable<HealthResult['metrics']> = {
    analyses: {
      total: storage.countAnalyses(),
      byStatus: storage.countByStatus(),
    },
  };

  if (container.getAnalyzerState() === 'ready') {
    const analyzer = await container.getAnalyzer();
    metrics.analyzer = {
      tokenizer: analyzer.tokenizer.name,
      trainingExamples: analyzer.classifier.exampleCount,
      vocabularySize: analyzer.classifier.vocabulary.size,
      trainingIterations: analyzer.classifier.iterations,
      thresholds: { ...analyzer.thresholds },
      initializedAt: analyzer.initializedAt,
    };
  }

  return metrics;
}

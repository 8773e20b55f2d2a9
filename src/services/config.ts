/**
 * Service configuration from environment variables.
 * LOG_LEVEL is read by the logger itself.
 */

import { z } from 'zod';
import type { ThresholdOverrides } from '../types/index.js';
import { InitializationError } from '../utils/errors.js';

export interface ServiceConfig {
  /** Database path for storage; ':memory:' keeps history in memory */
  dbPath?: string | undefined;
  /** Default thresholds for every analysis */
  thresholds?: ThresholdOverrides | undefined;
  allowTokenizerFallback?: boolean | undefined;
}

/** Unset and empty variables both mean "use the default" */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
}

const EnvSchema = z.object({
  REQCLARITY_DB_PATH: optional(z.string()),
  REQCLARITY_MAX_TOKENS: optional(z.coerce.number().int().min(1)),
  REQCLARITY_ML_THRESHOLD: optional(z.coerce.number().min(0).max(1)),
  REQCLARITY_TOP_K: optional(z.coerce.number().int().min(0).max(50)),
  REQCLARITY_ALLOW_TOKENIZER_FALLBACK: optional(z.enum(['true', 'false', '1', '0'])),
});

/**
 * @throws {InitializationError} when a variable is set to an invalid value
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new InitializationError('config', `invalid environment: ${issues.join('; ')}`, {
      details: { issues },
    });
  }

  const vars = parsed.data;
  const thresholds: ThresholdOverrides = {};
  if (vars.REQCLARITY_MAX_TOKENS !== undefined) thresholds.maxTokens = vars.REQCLARITY_MAX_TOKENS;
  if (vars.REQCLARITY_ML_THRESHOLD !== undefined) thresholds.mlThreshold = vars.REQCLARITY_ML_THRESHOLD;
  if (vars.REQCLARITY_TOP_K !== undefined) thresholds.topK = vars.REQCLARITY_TOP_K;

  const fallback = vars.REQCLARITY_ALLOW_TOKENIZER_FALLBACK;

  return {
    dbPath: vars.REQCLARITY_DB_PATH,
    thresholds,
    allowTokenizerFallback: fallback === undefined ? undefined : fallback === 'true' || fallback === '1',
  };
}

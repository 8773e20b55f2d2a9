/**
 * Word-level tokenization for the rule engine and the statistical scorer.
 *
 * A tokenizer is an injected dependency. Its optional `prepare` step (loading
 * resources, warming caches) runs once per analyzer through
 * {@link prepareTokenizer}; a failure there either aborts initialization or,
 * when fallback is allowed, swaps in the whitespace tokenizer and reports the
 * swap as a warning on every verdict.
 */

import { InitializationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface Tokenizer {
  readonly name: string;

  /** One-time setup. May be async; must not be needed per call. */
  prepare?(): void | Promise<void>;

  tokenize(text: string): string[];
}

/**
 * Maximal runs of letters and digits; an apostrophe or hyphen between two runs
 * joins them, so "don't" and "user-friendly" are single tokens.
 */
const WORD_PATTERN = /[\p{L}\p{N}]+(?:['’-][\p{L}\p{N}]+)*/gu;

export const wordTokenizer: Tokenizer = Object.freeze({
  name: 'word',
  tokenize(text: string): string[] {
    return text.match(WORD_PATTERN) ?? [];
  },
});

/**
 * Fallback: whitespace-separated chunks, punctuation left attached
 */
export const whitespaceTokenizer: Tokenizer = Object.freeze({
  name: 'whitespace',
  tokenize(text: string): string[] {
    return text.split(/\s+/).filter((chunk) => chunk.length > 0);
  },
});

export interface PreparedTokenizer {
  tokenizer: Tokenizer;
  /** Set when the fallback replaced the requested tokenizer */
  degradation?: string | undefined;
}

/**
 * Outcome of `prepare`, keyed by tokenizer instance, so repeat calls for the
 * same tokenizer never re-run setup.
 */
const preparations = new WeakMap<Tokenizer, Promise<void>>();

function runPrepare(tokenizer: Tokenizer): Promise<void> {
  let pending = preparations.get(tokenizer);
  if (!pending) {
    pending = Promise.resolve().then(() => tokenizer.prepare?.());
    preparations.set(tokenizer, pending);
  }
  return pending;
}

/**
 * Run the tokenizer's setup once and resolve to the tokenizer to use.
 *
 * @throws {InitializationError} when setup fails and fallback is not allowed
 */
export async function prepareTokenizer(
  tokenizer: Tokenizer,
  options: { allowFallback?: boolean | undefined } = {}
): Promise<PreparedTokenizer> {
  try {
    await runPrepare(tokenizer);
    return { tokenizer };
  } catch (error) {
    const cause = error instanceof Error ? error.message : String(error);

    if (!options.allowFallback) {
      throw new InitializationError('tokenizer', `"${tokenizer.name}" tokenizer is unavailable: ${cause}`, {
        details: { tokenizer: tokenizer.name },
        cause: error,
      });
    }

    const degradation =
      `Tokenizer "${tokenizer.name}" unavailable (${cause}); ` +
      `using "${whitespaceTokenizer.name}" tokenization, token counts may differ`;
    logger.warn('Tokenizer fallback in use', error, {
      requested: tokenizer.name,
      fallback: whitespaceTokenizer.name,
    });
    return { tokenizer: whitespaceTokenizer, degradation };
  }
}

/**
 * Rule Engine
 *
 * Deterministic checks over the raw requirement text:
 * 1. Vague terms from the lexicon
 * 2. Presence of at least one measurable constraint
 * 3. Sentence complexity by token count
 *
 * Empty findings are the expected outcome for a clear requirement.
 */

import type { RuleFindings } from '../types/index.js';
import type { Lexicon } from './lexicon.js';
import type { Tokenizer } from './tokenizer.js';

export function analyzeRules(
  text: string,
  lexicon: Lexicon,
  tokenizer: Tokenizer,
  maxTokens: number
): RuleFindings {
  const vagueMatches = lexicon.findVagueTerms(text);
  const hasConstraint = lexicon.hasMeasurableConstraint(text);
  const tokenCount = tokenizer.tokenize(text).length;

  return {
    vagueMatches,
    hasConstraint,
    isComplex: tokenCount > maxTokens,
    tokenCount,
  };
}

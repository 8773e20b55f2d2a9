/**
 * Verdict Aggregator
 *
 * Merges rule findings and the classifier result into one ordered reason
 * list. Status and severity depend on the number of reasons and nothing else.
 */

import type {
  ClarityStatus,
  ClassifierResult,
  Reason,
  RuleFindings,
  Severity,
  Thresholds,
} from '../types/index.js';

export interface Outcome {
  status: ClarityStatus;
  severity: Severity;
}

/**
 * 0 reasons → Clear/1, 1 → PartiallyClear/2, 2 or more → Unclear/3
 */
export function deriveOutcome(reasonCount: number): Outcome {
  if (reasonCount <= 0) {
    return { status: 'Clear', severity: 1 };
  }
  if (reasonCount === 1) {
    return { status: 'PartiallyClear', severity: 2 };
  }
  return { status: 'Unclear', severity: 3 };
}

export function aggregate(
  findings: RuleFindings,
  classifierResult: ClassifierResult,
  thresholds: Pick<Thresholds, 'maxTokens' | 'mlThreshold'>
): Outcome & { reasons: Reason[] } {
  const reasons: Reason[] = [];

  if (findings.vagueMatches.length > 0) {
    reasons.push({
      tag: 'VAGUE_TERMS',
      message: `Vague terms detected: ${findings.vagueMatches.map((m) => m.term).join(', ')}`,
    });
  }

  if (!findings.hasConstraint) {
    reasons.push({
      tag: 'NO_CONSTRAINTS',
      message: 'No measurable constraints provided.',
    });
  }

  if (findings.isComplex) {
    reasons.push({
      tag: 'COMPLEX_SENTENCE',
      message: `Sentence too long or complex (${findings.tokenCount} tokens, limit ${thresholds.maxTokens}).`,
    });
  }

  if (classifierResult.probability > thresholds.mlThreshold) {
    reasons.push({
      tag: 'ML_AMBIGUITY',
      message:
        `ML model suggests possible ambiguity ` +
        `(p=${classifierResult.probability.toFixed(2)} > ${thresholds.mlThreshold.toFixed(2)}).`,
    });
  }

  return { reasons, ...deriveOutcome(reasons.length) };
}

/**
 * Rewrite Assistant
 *
 * Proposes a clearer rewording of a requirement: vague terms become the
 * lexicon's concrete replacements, and a requirement with no measurable
 * constraint gets a placeholder target. The loop re-analyzes each rewrite
 * until it is clear or stops changing.
 *
 * Verdicts are never altered here; every iteration is a fresh analysis.
 */

import type { ReasonTag, ThresholdOverrides, Verdict } from '../types/index.js';
import { type AnalyzerHandle, analyze } from './analyzer.js';
import type { Lexicon } from './lexicon.js';

export const UNKNOWN_TARGET = '[measurable target]';
export const DEFAULT_CONSTRAINT = 'within 2 seconds';
export const PLACEHOLDER_NOTE =
  'Suggested values are placeholders; confirm the real targets with stakeholders before adopting the rewrite.';

const RATIONALE: Record<ReasonTag, string> = {
  VAGUE_TERMS: 'Replaced subjective wording with concrete values that can be tested.',
  NO_CONSTRAINTS: 'Added a measurable target so the requirement can be verified.',
  COMPLEX_SENTENCE: 'Split long requirements into shorter statements, one behaviour each.',
  ML_AMBIGUITY: 'The wording resembles requirements judged ambiguous; review the highest-weighted words.',
  EMPTY_INPUT: 'Write the requirement down before asking for a rewrite.',
  ANALYSIS_FAILED: 'The statement could not be analyzed; retry with plain text.',
};

export interface AssistIteration {
  iteration: number;
  text: string;
  verdict: Verdict;
}

export interface AssistResult {
  original: Verdict;
  iterations: AssistIteration[];
  finalText: string;
  finalVerdict: Verdict;
  rationale: string[];
  improved: boolean;
  note: string;
}

export interface AssistOptions {
  maxIterations?: number | undefined;
  overrides?: ThresholdOverrides | undefined;
}

/** Trailing sentence punctuation, kept after an appended constraint */
const SENTENCE_PUNCTUATION = new Set(['.', '!', '?', ';', ':']);

function appendConstraint(text: string): string {
  const trimmed = text.trimEnd();
  let end = trimmed.length;
  while (end > 0 && SENTENCE_PUNCTUATION.has(trimmed.charAt(end - 1))) {
    end--;
  }
  return `${trimmed.slice(0, end).trimEnd()} ${DEFAULT_CONSTRAINT}${trimmed.slice(end)}`;
}

export function suggestRewrite(text: string, verdict: Verdict, lexicon: Lexicon): string {
  const spans = lexicon
    .findVagueTerms(text)
    .flatMap(({ term, spans: termSpans }) => termSpans.map((span) => ({ term, ...span })))
    .sort((a, b) => a.start - b.start || b.end - a.end);

  let rewritten = '';
  let cursor = 0;
  for (const { term, start, end } of spans) {
    if (start < cursor) {
      continue;
    }
    rewritten += text.slice(cursor, start) + (lexicon.suggestions[term] ?? UNKNOWN_TARGET);
    cursor = end;
  }
  rewritten += text.slice(cursor);

  if (verdict.tags.includes('NO_CONSTRAINTS') && !lexicon.hasMeasurableConstraint(rewritten)) {
    rewritten = appendConstraint(rewritten);
  }

  return rewritten;
}

export function buildRationale(tags: readonly ReasonTag[]): string[] {
  return [...new Set(tags)].map((tag) => RATIONALE[tag]);
}

export function runAssist(handle: AnalyzerHandle, text: string, options: AssistOptions = {}): AssistResult {
  const maxIterations = options.maxIterations ?? 3;
  const original = analyze(handle, text, options.overrides);

  const iterations: AssistIteration[] = [];
  let currentText = text;
  let current = original;

  for (let iteration = 1; iteration <= maxIterations && current.severity > 1; iteration++) {
    const next = suggestRewrite(currentText, current, handle.lexicon);
    if (next === currentText) {
      break;
    }
    currentText = next;
    current = analyze(handle, next, options.overrides);
    iterations.push({ iteration, text: next, verdict: current });
  }

  return {
    original,
    iterations,
    finalText: currentText,
    finalVerdict: current,
    rationale: buildRationale(original.tags),
    improved: current.severity < original.severity,
    note: PLACEHOLDER_NOTE,
  };
}

/**
 * Explainability Formatter
 *
 * Pure transforms from analysis results to presentation-agnostic structures:
 * word/weight pairs for charting, highlight spans for vague terms, and the
 * flat export row. Nothing here changes reasons, status or severity.
 */

import type {
  ClarityStatus,
  ClassifierResult,
  Explanation,
  ExportRow,
  Highlight,
  HighlightStyle,
  VagueTermMatch,
  Verdict,
} from '../types/index.js';

export const STATUS_LABELS: Readonly<Record<ClarityStatus, string>> = Object.freeze({
  Clear: 'Clear',
  PartiallyClear: 'Partially Clear',
  Unclear: 'Unclear',
});

export const EXPORT_COLUMNS: ReadonlyArray<keyof ExportRow> = [
  'Requirement',
  'Status',
  'Severity',
  'Tags',
  'Reasons',
];

export function formatExplanation(
  classifierResult: ClassifierResult,
  vagueMatches: readonly VagueTermMatch[]
): Explanation {
  const wordWeights = classifierResult.rankedWords.map(({ word, weight }) => ({
    word,
    weight,
    direction: weight > 0 ? ('unclear' as const) : ('clear' as const),
  }));

  const highlights: Highlight[] = vagueMatches
    .flatMap(({ term, spans }) => spans.map(({ start, end }) => ({ term, start, end })))
    .sort((a, b) => a.start - b.start || b.end - a.end);

  return { wordWeights, highlights };
}

const WRAPPERS: Record<HighlightStyle, (fragment: string) => string> = {
  bold: (fragment) => `**${fragment}**`,
  color: (fragment) => `:red[${fragment}]`,
};

/**
 * Wrap each highlighted span in markdown, keeping the text as the user wrote it.
 * A span that overlaps an earlier one is left unwrapped.
 */
export function highlightVagueTerms(
  text: string,
  highlights: readonly Highlight[],
  style: HighlightStyle = 'bold'
): string {
  const wrap = WRAPPERS[style];
  let output = '';
  let cursor = 0;

  for (const { start, end } of highlights) {
    if (start < cursor || end > text.length) {
      continue;
    }
    output += text.slice(cursor, start) + wrap(text.slice(start, end));
    cursor = end;
  }

  return output + text.slice(cursor);
}

/**
 * Tabular projection of a verdict: flat scalars, lists pre-joined.
 */
export function toExportRow(verdict: Verdict): ExportRow {
  return {
    Requirement: verdict.text,
    Status: STATUS_LABELS[verdict.status],
    Severity: verdict.severity,
    Tags: verdict.tags.join(', '),
    Reasons: verdict.reasons.map((r) => r.message).join(' | '),
  };
}

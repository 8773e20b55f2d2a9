import { describe, it, expect } from 'vitest';
import { EXPORT_COLUMNS, formatExplanation, highlightVagueTerms, toExportRow } from './explainability.js';
import { DEFAULT_THRESHOLDS, type Verdict } from '../types/index.js';

describe('formatExplanation', () => {
  it('labels word weights and orders highlights by position', () => {
    const explanation = formatExplanation(
      {
        probability: 0.7,
        rankedWords: [
          { word: 'fast', weight: 1.2 },
          { word: 'seconds', weight: -0.8 },
        ],
      },
      [
        { term: 'fast', spans: [{ start: 21, end: 25 }] },
        { term: 'scalable', spans: [{ start: 4, end: 12 }] },
      ]
    );

    expect(explanation).toEqual({
      wordWeights: [
        { word: 'fast', weight: 1.2, direction: 'unclear' },
        { word: 'seconds', weight: -0.8, direction: 'clear' },
      ],
      highlights: [
        { term: 'scalable', start: 4, end: 12 },
        { term: 'fast', start: 21, end: 25 },
      ],
    });
  });
});

describe('highlightVagueTerms', () => {
  const text = 'The system shall be FAST.';
  const highlights = [{ term: 'fast', start: 20, end: 24 }];

  it('wraps terms in bold by default, keeping the original casing', () => {
    expect(highlightVagueTerms(text, highlights)).toBe('The system shall be **FAST**.');
  });

  it('supports colored highlights', () => {
    expect(highlightVagueTerms(text, highlights, 'color')).toBe('The system shall be :red[FAST].');
  });

  it('skips spans that overlap an earlier one', () => {
    expect(
      highlightVagueTerms('highly available', [
        { term: 'highly available', start: 0, end: 16 },
        { term: 'available', start: 7, end: 16 },
      ])
    ).toBe('**highly available**');
  });

  it('returns the text unchanged without highlights', () => {
    expect(highlightVagueTerms(text, [])).toBe(text);
  });
});

describe('toExportRow', () => {
  const verdict: Verdict = {
    text: 'The UI should be user-friendly.',
    status: 'Unclear',
    severity: 3,
    reasons: [
      { tag: 'VAGUE_TERMS', message: 'Vague terms detected: user-friendly' },
      { tag: 'NO_CONSTRAINTS', message: 'No measurable constraints provided.' },
    ],
    tags: ['VAGUE_TERMS', 'NO_CONSTRAINTS'],
    vagueMatches: [{ term: 'user-friendly', spans: [{ start: 17, end: 30 }] }],
    hasConstraint: false,
    tokenCount: 5,
    classifier: { probability: 0.8, rankedWords: [] },
    explanation: { wordWeights: [], highlights: [] },
    thresholds: { ...DEFAULT_THRESHOLDS },
    warnings: [],
  };

  it('flattens a verdict into export columns', () => {
    expect(toExportRow(verdict)).toEqual({
      Requirement: 'The UI should be user-friendly.',
      Status: 'Unclear',
      Severity: 3,
      Tags: 'VAGUE_TERMS, NO_CONSTRAINTS',
      Reasons: 'Vague terms detected: user-friendly | No measurable constraints provided.',
    });
  });

  it('uses a readable label for partially clear verdicts', () => {
    expect(toExportRow({ ...verdict, status: 'PartiallyClear', severity: 2 }).Status).toBe('Partially Clear');
  });

  it('covers every export column', () => {
    expect(Object.keys(toExportRow(verdict))).toEqual([...EXPORT_COLUMNS]);
  });
});

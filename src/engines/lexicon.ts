/**
 * Lexicon Store
 *
 * Static vocabulary the rule engine works from:
 * - vague terms (subjective or unmeasurable words and phrases)
 * - measurable-constraint units (a number bound to one of these is a constraint)
 * - concrete replacements for vague terms, used by the rewrite assistant
 *
 * Defaults live in data/lexicon.json. Any list can be replaced per analyzer.
 * A missing match is a normal outcome, never an error.
 */

import {
  type LexiconData,
  type LexiconOverrides,
  type VagueTermMatch,
  LexiconDataSchema,
  LexiconOverridesSchema,
} from '../types/index.js';
import { readDataFile } from '../utils/data-files.js';
import { InitializationError } from '../utils/errors.js';

export interface Lexicon {
  readonly vagueTerms: readonly string[];
  readonly units: readonly string[];
  readonly suggestions: Readonly<Record<string, string>>;

  /** Every lexicon term occurring in the text, in lexicon order, with all spans */
  findVagueTerms(text: string): VagueTermMatch[];

  /** True when a number bound to a unit, or a percentage, occurs in the text */
  hasMeasurableConstraint(text: string): boolean;
}

export const DEFAULT_LEXICON_FILE = 'lexicon.json';

/**
 * A term may not be glued to a letter, digit, underscore or hyphen, so "fast"
 * misses "breakfast" and "friendly" misses "user-friendly".
 */
const TERM_BOUNDARY_BEFORE = '(?<![\\p{L}\\p{N}_-])';
const TERM_BOUNDARY_AFTER = '(?![\\p{L}\\p{N}_-])';

/** Integer or decimal, with optional thousands separators: 2, 1.5, 10,000 */
const NUMBER_PATTERN = '(?<![\\p{L}\\p{N}_])\\d+(?:[.,]\\d+)*';

/** Always recognised, whatever unit list is configured */
const PERCENT_UNITS = ['%', 'percent'];

let defaultData: LexiconData | null = null;

function loadDefaultLexiconData(): LexiconData {
  if (!defaultData) {
    const parsed = LexiconDataSchema.safeParse(readDataFile(DEFAULT_LEXICON_FILE));
    if (!parsed.success) {
      throw new InitializationError('lexicon', `${DEFAULT_LEXICON_FILE} is invalid`, {
        details: { issues: parsed.error.issues.map((i) => i.message) },
      });
    }
    defaultData = parsed.data;
  }
  return defaultData;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function normalizeTerms(terms: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const term of terms) {
    const normalized = term.trim().toLowerCase().replace(/\s+/g, ' ');
    if (normalized.length > 0) {
      seen.add(normalized);
    }
  }
  return [...seen];
}

function compileTermPattern(term: string): RegExp {
  const body = term.split(' ').map(escapeRegExp).join('\\s+');
  return new RegExp(`${TERM_BOUNDARY_BEFORE}${body}${TERM_BOUNDARY_AFTER}`, 'giu');
}

/**
 * Word units accept a plural "s" ("second" matches "seconds"); symbols match as-is.
 */
function compileConstraintPattern(units: readonly string[]): RegExp {
  const alternatives = normalizeTerms([...units, ...PERCENT_UNITS])
    .sort((a, b) => b.length - a.length)
    .map((unit) => (/^\p{L}+$/u.test(unit) ? `${escapeRegExp(unit)}s?` : escapeRegExp(unit)));

  return new RegExp(`${NUMBER_PATTERN}\\s*(?:${alternatives.join('|')})(?!\\p{L})`, 'iu');
}

/**
 * Build a lexicon from the defaults, replacing any list given in `overrides`.
 *
 * @throws {InitializationError} when the overrides or the default data are invalid
 */
export function createLexicon(overrides?: LexiconOverrides): Lexicon {
  const parsedOverrides = LexiconOverridesSchema.safeParse(overrides ?? {});
  if (!parsedOverrides.success) {
    throw new InitializationError('lexicon', 'invalid lexicon overrides', {
      details: { issues: parsedOverrides.error.issues.map((i) => i.message) },
    });
  }

  const defaults = loadDefaultLexiconData();
  const vagueTerms = Object.freeze(normalizeTerms(parsedOverrides.data.vagueTerms ?? defaults.vagueTerms));
  const units = Object.freeze(normalizeTerms(parsedOverrides.data.units ?? defaults.units));

  const suggestions: Record<string, string> = {};
  for (const [term, replacement] of Object.entries(parsedOverrides.data.suggestions ?? defaults.suggestions)) {
    suggestions[term.trim().toLowerCase()] = replacement;
  }

  const termPatterns = vagueTerms.map((term) => ({ term, pattern: compileTermPattern(term) }));
  const constraintPattern = compileConstraintPattern(units);

  return Object.freeze({
    vagueTerms,
    units,
    suggestions: Object.freeze(suggestions),

    findVagueTerms(text: string): VagueTermMatch[] {
      const matches: VagueTermMatch[] = [];
      for (const { term, pattern } of termPatterns) {
        const spans = [...text.matchAll(pattern)].map((m) => {
          const start = m.index ?? 0;
          return { start, end: start + m[0].length };
        });
        if (spans.length > 0) {
          matches.push({ term, spans });
        }
      }
      return matches;
    },

    hasMeasurableConstraint(text: string): boolean {
      return constraintPattern.test(text);
    },
  });
}

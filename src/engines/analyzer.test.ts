import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import { type AnalyzerHandle, analyze, analyzeBatch, initialize } from './analyzer.js';
import { type Tokenizer, wordTokenizer } from './tokenizer.js';
import { InitializationError, ValidationError } from '../utils/errors.js';

const SCENARIO = {
  measurable: 'The system shall respond in under 2 seconds.',
  userFriendly: 'The UI should be user-friendly.',
  users: 'The app must handle 500 users without errors.',
  fastScalable: 'The system shall be fast and scalable.',
};

const SAMPLES = [
  ...Object.values(SCENARIO),
  '',
  'Reports should be easy to read and the export must finish within 30 seconds for 1000 rows.',
  'The platform should be flexible, robust, intuitive and highly available for many users in every region we operate in today.',
];

describe('analyzer', () => {
  let handle: AnalyzerHandle;

  beforeAll(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    handle = await initialize();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('analyze', () => {
    it('grades a measurable requirement as clear', () => {
      const verdict = analyze(handle, SCENARIO.measurable);

      expect(verdict.status).toBe('Clear');
      expect(verdict.severity).toBe(1);
      expect(verdict.reasons).toEqual([]);
      expect(verdict.hasConstraint).toBe(true);
      expect(verdict.tokenCount).toBe(8);
    });

    it('grades a vague requirement without constraints as unclear', () => {
      const verdict = analyze(handle, SCENARIO.userFriendly);

      expect(verdict.tags).toContain('VAGUE_TERMS');
      expect(verdict.tags).toContain('NO_CONSTRAINTS');
      expect(verdict.reasons[0]).toEqual({ tag: 'VAGUE_TERMS', message: 'Vague terms detected: user-friendly' });
      expect(verdict.status).toBe('Unclear');
      expect(verdict.severity).toBe(3);
      expect(verdict.explanation.highlights).toEqual([{ term: 'user-friendly', start: 17, end: 30 }]);
    });

    it('detects a count-based constraint', () => {
      const verdict = analyze(handle, SCENARIO.users);

      expect(verdict.hasConstraint).toBe(true);
      expect(verdict.status).toBe('Clear');
      expect(verdict.severity).toBe(1);
    });

    it('lists every vague term found', () => {
      const verdict = analyze(handle, SCENARIO.fastScalable);

      expect(verdict.reasons[0]?.message).toBe('Vague terms detected: fast, scalable');
      expect(verdict.tags).toContain('NO_CONSTRAINTS');
      expect(verdict.status).toBe('Unclear');
      expect(verdict.severity).toBe(3);
    });

    it.each(['', '   \n\t'])('returns an empty-input verdict for %j', (text) => {
      const verdict = analyze(handle, text);

      expect(verdict.reasons).toEqual([{ tag: 'EMPTY_INPUT', message: 'Empty requirement: nothing to analyze.' }]);
      expect(verdict.status).toBe('PartiallyClear');
      expect(verdict.severity).toBe(2);
      expect(verdict.tokenCount).toBe(0);
      expect(verdict.vagueMatches).toEqual([]);
    });

    it.each(SAMPLES)('keeps status, severity and tags consistent with reasons for %j', (text) => {
      const verdict = analyze(handle, text);
      const count = verdict.reasons.length;

      expect(verdict.tags).toEqual(verdict.reasons.map((r) => r.tag));
      expect(verdict.severity).toBe(count === 0 ? 1 : count === 1 ? 2 : 3);
      expect(verdict.status).toBe(count === 0 ? 'Clear' : count === 1 ? 'PartiallyClear' : 'Unclear');
      expect(verdict.classifier.probability).toBeGreaterThanOrEqual(0);
      expect(verdict.classifier.probability).toBeLessThanOrEqual(1);
      expect(verdict.classifier.rankedWords.length).toBeLessThanOrEqual(handle.thresholds.topK);

      const written = new Set(wordTokenizer.tokenize(text).map((token) => token.toLowerCase()));
      expect(verdict.classifier.rankedWords.map(({ word }) => word).filter((word) => !written.has(word))).toEqual([]);
    });

    it('is idempotent', () => {
      expect(analyze(handle, SCENARIO.fastScalable)).toEqual(analyze(handle, SCENARIO.fastScalable));
    });

    it('returns a frozen verdict', () => {
      const verdict = analyze(handle, SCENARIO.userFriendly);

      expect(Object.isFrozen(verdict)).toBe(true);
      expect(Object.isFrozen(verdict.reasons)).toBe(true);
      expect(Object.isFrozen(verdict.explanation.highlights)).toBe(true);
    });
  });

  describe('threshold overrides', () => {
    it('flags long sentences against the given token limit', () => {
      const verdict = analyze(handle, SCENARIO.measurable, { maxTokens: 5 });

      expect(verdict.reasons).toEqual([
        { tag: 'COMPLEX_SENTENCE', message: 'Sentence too long or complex (8 tokens, limit 5).' },
      ]);
      expect(verdict.status).toBe('PartiallyClear');
      expect(verdict.severity).toBe(2);
      expect(verdict.thresholds.maxTokens).toBe(5);
    });

    it('flags ML ambiguity at a zero threshold', () => {
      expect(analyze(handle, SCENARIO.measurable, { mlThreshold: 0 }).tags).toEqual(['ML_AMBIGUITY']);
    });

    it('never adds reasons when thresholds are relaxed', () => {
      for (const text of SAMPLES) {
        const strict = analyze(handle, text).tags;
        const relaxed = analyze(handle, text, { maxTokens: 1000, mlThreshold: 1 }).tags;
        expect(relaxed.every((tag) => strict.includes(tag))).toBe(true);
      }
    });

    it('limits ranked words to topK', () => {
      expect(analyze(handle, SCENARIO.fastScalable, { topK: 1 }).classifier.rankedWords).toHaveLength(1);
    });

    it('rejects out-of-range overrides', () => {
      expect(() => analyze(handle, SCENARIO.measurable, { mlThreshold: 2 })).toThrow(ValidationError);
      expect(() => analyze(handle, SCENARIO.measurable, { maxTokens: 0 })).toThrow(ValidationError);
    });

    it('leaves the handle untouched', () => {
      analyze(handle, SCENARIO.measurable, { maxTokens: 3 });
      expect(handle.thresholds).toEqual({ maxTokens: 20, mlThreshold: 0.6, topK: 5 });
    });
  });

  describe('analyzeBatch', () => {
    it('matches analyze element by element, in order', () => {
      expect(analyzeBatch(handle, SAMPLES)).toEqual(SAMPLES.map((text) => analyze(handle, text)));
    });

    it('applies overrides to every statement', () => {
      const verdicts = analyzeBatch(handle, [SCENARIO.measurable, SCENARIO.users], { maxTokens: 5 });
      expect(verdicts.map((v) => v.tags)).toEqual([['COMPLEX_SENTENCE'], ['COMPLEX_SENTENCE']]);
    });

    it('returns an empty list for no input', () => {
      expect(analyzeBatch(handle, [])).toEqual([]);
    });

    it('keeps going after a statement fails', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(console, 'info').mockImplementation(() => {});
      const fragile: Tokenizer = {
        name: 'fragile',
        tokenize: (text) => {
          if (text.includes('explode')) {
            throw new Error('tokenizer exploded');
          }
          return wordTokenizer.tokenize(text);
        },
      };

      return initialize({ tokenizer: fragile }).then((fragileHandle) => {
        const [failed, ok] = analyzeBatch(fragileHandle, ['explode now', SCENARIO.measurable]);

        expect(failed?.reasons).toEqual([{ tag: 'ANALYSIS_FAILED', message: 'Analysis failed: tokenizer exploded' }]);
        expect(failed?.status).toBe('PartiallyClear');
        expect(ok?.status).toBe('Clear');
        expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Requirement analysis failed'));
      });
    });
  });

  describe('initialize', () => {
    const broken: Tokenizer = {
      name: 'broken',
      prepare: () => {
        throw new Error('resource missing');
      },
      tokenize: (text) => text.split(/\s+/),
    };

    it('lets differently configured handles coexist', async () => {
      vi.spyOn(console, 'info').mockImplementation(() => {});
      const strict = await initialize({ thresholds: { maxTokens: 5 } });

      expect(analyze(strict, SCENARIO.measurable).status).toBe('PartiallyClear');
      expect(analyze(handle, SCENARIO.measurable).status).toBe('Clear');
    });

    it('applies lexicon overrides', async () => {
      vi.spyOn(console, 'info').mockImplementation(() => {});
      const custom = await initialize({ lexicon: { vagueTerms: ['shall'] } });

      expect(analyze(custom, SCENARIO.measurable).tags).toContain('VAGUE_TERMS');
    });

    it('fails when the tokenizer cannot be prepared', async () => {
      await expect(initialize({ tokenizer: broken })).rejects.toBeInstanceOf(InitializationError);
    });

    it('reports the tokenizer fallback on every verdict', async () => {
      vi.spyOn(console, 'info').mockImplementation(() => {});
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const degraded = await initialize({ tokenizer: broken, allowTokenizerFallback: true });

      expect(degraded.tokenizer.name).toBe('whitespace');
      for (const verdict of analyzeBatch(degraded, [SCENARIO.measurable, ''])) {
        expect(verdict.warnings).toEqual([
          'Tokenizer "broken" unavailable (resource missing); using "whitespace" tokenization, token counts may differ',
        ]);
      }
      expect(analyze(handle, SCENARIO.measurable).warnings).toEqual([]);
    });

    it('fails on a single-class corpus', async () => {
      await expect(
        initialize({ corpus: [{ text: 'The system shall be fast.', label: 1 }] })
      ).rejects.toThrow('training corpus contains a single class');
    });

    it('fails on invalid default thresholds', async () => {
      await expect(initialize({ thresholds: { mlThreshold: -1 } })).rejects.toThrow(
        'Initialization failed (thresholds)'
      );
    });

    it('returns a read-only handle', () => {
      expect(Object.isFrozen(handle)).toBe(true);
      expect(Object.isFrozen(handle.thresholds)).toBe(true);
    });
  });
});

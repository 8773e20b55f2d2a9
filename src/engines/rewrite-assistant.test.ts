import { describe, it, expect, beforeAll, vi } from 'vitest';
import { type AnalyzerHandle, analyze, initialize } from './analyzer.js';
import { PLACEHOLDER_NOTE, buildRationale, runAssist, suggestRewrite } from './rewrite-assistant.js';

describe('rewrite assistant', () => {
  let handle: AnalyzerHandle;

  beforeAll(async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    handle = await initialize();
    info.mockRestore();
  });

  function rewrite(text: string): string {
    return suggestRewrite(text, analyze(handle, text), handle.lexicon);
  }

  describe('suggestRewrite', () => {
    it('replaces vague terms with concrete suggestions', () => {
      expect(rewrite('The UI should be user-friendly.')).toBe(
        'The UI should be usable by a first-time user within 5 minutes.'
      );
      expect(rewrite('The system shall be fast and scalable.')).toBe(
        'The system shall be able to respond within 2 seconds and able to serve 1000 users at once.'
      );
    });

    it('adds a default target when nothing measurable remains', () => {
      expect(rewrite('Users can export reports')).toBe('Users can export reports within 2 seconds');
      expect(rewrite('Users can export reports!')).toBe('Users can export reports within 2 seconds!');
      expect(rewrite('Users can export reports .  ')).toBe('Users can export reports within 2 seconds.');
    });

    it('handles long whitespace runs in linear time', () => {
      const text = `The UI should be nice${' '.repeat(9000)}and clean`;

      const started = performance.now();
      const result = runAssist(handle, text, { maxIterations: 1 });
      const elapsedMs = performance.now() - started;

      expect(result.iterations[0]?.text).toBe(`${text} within 2 seconds`);
      expect(elapsedMs).toBeLessThan(1000);
    });

    it('marks terms that have no suggestion', async () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => {});
      const custom = await initialize({ lexicon: { vagueTerms: ['snappy'] } });
      info.mockRestore();

      const text = 'The menu should feel snappy.';
      expect(suggestRewrite(text, analyze(custom, text), custom.lexicon)).toBe(
        'The menu should feel [measurable target] within 2 seconds.'
      );
    });

    it('leaves a measurable requirement unchanged', () => {
      const text = 'The system shall respond in under 2 seconds.';
      expect(rewrite(text)).toBe(text);
    });
  });

  describe('buildRationale', () => {
    it('gives one bullet per distinct tag', () => {
      expect(buildRationale(['VAGUE_TERMS', 'NO_CONSTRAINTS', 'VAGUE_TERMS'])).toEqual([
        'Replaced subjective wording with concrete values that can be tested.',
        'Added a measurable target so the requirement can be verified.',
      ]);
    });

    it('is empty for a clear verdict', () => {
      expect(buildRationale([])).toEqual([]);
    });
  });

  describe('runAssist', () => {
    it('rewrites an unclear requirement until the rules pass', () => {
      const result = runAssist(handle, 'The UI should be user-friendly.');

      expect(result.original.severity).toBe(3);
      expect(result.iterations).toHaveLength(1);
      expect(result.iterations[0]?.iteration).toBe(1);
      expect(result.finalText).toBe('The UI should be usable by a first-time user within 5 minutes.');
      expect(result.finalText).not.toContain('user-friendly');
      expect(result.finalVerdict.tags).not.toContain('VAGUE_TERMS');
      expect(result.finalVerdict.tags).not.toContain('NO_CONSTRAINTS');
      expect(result.improved).toBe(true);
      expect(result.rationale).toContain('Added a measurable target so the requirement can be verified.');
      expect(result.note).toBe(PLACEHOLDER_NOTE);
    });

    it('does nothing for a clear requirement', () => {
      const text = 'The system shall respond in under 2 seconds.';
      const result = runAssist(handle, text);

      expect(result.iterations).toEqual([]);
      expect(result.finalText).toBe(text);
      expect(result.finalVerdict).toEqual(result.original);
      expect(result.improved).toBe(false);
      expect(result.rationale).toEqual([]);
    });

    it('stops when the rewrite stops changing', () => {
      const result = runAssist(handle, '');

      expect(result.iterations).toEqual([]);
      expect(result.rationale).toEqual(['Write the requirement down before asking for a rewrite.']);
    });

    it('respects the iteration cap', () => {
      const result = runAssist(handle, 'The system shall be fast and scalable.', { maxIterations: 1 });
      expect(result.iterations.length).toBeLessThanOrEqual(1);
    });

    it('passes overrides to every analysis', () => {
      const result = runAssist(handle, 'The UI should be user-friendly.', { overrides: { maxTokens: 3 } });

      expect(result.original.thresholds.maxTokens).toBe(3);
      expect(result.finalVerdict.tags).toContain('COMPLEX_SENTENCE');
    });
  });
});

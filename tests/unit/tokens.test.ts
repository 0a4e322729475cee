import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../src/errors.js';
import { defaultConfig } from '../../src/config/index.js';
import {
  distributeBudget,
  estimateTokens,
  truncateToTokens,
  truncationMarker,
} from '../../src/context/tokens.js';

const weights = defaultConfig().context.sourceWeights;
const plainMarker = '...\n\n*(truncated)*';

describe('estimateTokens', () => {
  it('counts four characters per token, rounding down', () => {
    expect(estimateTokens('a'.repeat(10))).toBe(2);
    expect(estimateTokens('abc')).toBe(0);
  });

  it('scales whitespace-separated words by 1.3', () => {
    expect(estimateTokens('one two three', 'words')).toBe(4);
    expect(estimateTokens('  one   two ', 'words')).toBe(3);
  });

  it('treats blank text as empty', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('   \n\t', 'words')).toBe(0);
  });
});

describe('distributeBudget', () => {
  it('splits proportionally to source weights', () => {
    expect(distributeBudget(['memory', 'code', 'experience'], weights, 600)).toEqual({
      memory: 100,
      code: 200,
      experience: 300,
    });
  });

  it('floors each share', () => {
    const even = { ...weights, memory: 1, value: 1, commit: 1 };
    expect(distributeBudget(['memory', 'value', 'commit'], even, 100)).toEqual({
      memory: 33,
      value: 33,
      commit: 33,
    });
  });

  it('ignores a repeated source', () => {
    expect(distributeBudget(['code', 'code'], weights, 50)).toEqual({ code: 50 });
  });

  it('rejects unknown sources and bad weights', () => {
    expect(() => distributeBudget(['docs'], weights, 100)).toThrow(ValidationError);
    expect(() => distributeBudget(['memory'], { ...weights, memory: 0 }, 100)).toThrow(ValidationError);
  });

  it.each([0, -5, 1.5, 100001])('rejects maxTokens %s', (maxTokens) => {
    expect(() => distributeBudget(['memory'], weights, maxTokens)).toThrow(ValidationError);
  });
});

describe('truncationMarker', () => {
  it('points code at its file and line', () => {
    expect(truncationMarker('code', { file_path: 'src/a.ts', line_start: 12 }))
      .toBe('...\n\n*(truncated, see full at src/a.ts:12)*');
  });

  it('names the experience id', () => {
    expect(truncationMarker('experience', { id: 'exp-7' }))
      .toBe('...\n\n*(truncated, full experience ID: exp-7)*');
  });

  it('falls back to placeholders and a plain marker', () => {
    expect(truncationMarker('code', {})).toBe('...\n\n*(truncated, see full at unknown:?)*');
    expect(truncationMarker('memory', { id: 'm1' })).toBe(plainMarker);
  });
});

describe('truncateToTokens', () => {
  it('keeps the longest prefix that fits with the marker', () => {
    // 25 + 18 marker characters = 43, floor(43 / 4) = 10
    const cut = truncateToTokens('a'.repeat(100), 10, plainMarker);
    expect(cut).toBe('a'.repeat(25) + plainMarker);
    expect(estimateTokens(cut ?? '')).toBe(10);
  });

  it('returns null when the marker alone is too long', () => {
    expect(truncateToTokens('a'.repeat(100), 3, plainMarker)).toBeNull();
  });

  it('backs up to a nearby line break', () => {
    const text = 'x'.repeat(22) + '\n' + 'y'.repeat(50);
    expect(truncateToTokens(text, 10, plainMarker)).toBe('x'.repeat(22) + plainMarker);
  });

  it('ignores a line break early in the slice', () => {
    const text = 'x'.repeat(5) + '\n' + 'y'.repeat(50);
    expect(truncateToTokens(text, 10, plainMarker)).toBe(text.slice(0, 25) + plainMarker);
  });

  it('does not split a surrogate pair', () => {
    const text = 'a'.repeat(24) + '\u{1F600}' + 'b'.repeat(50);
    expect(truncateToTokens(text, 10, plainMarker)).toBe('a'.repeat(24) + plainMarker);
  });
});

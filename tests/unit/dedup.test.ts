import { describe, it, expect } from 'vitest';
import { canonicalKey, deduplicate } from '../../src/context/dedup.js';
import type { ContextItem, ContextSource } from '../../src/context/types.js';
import type { Payload } from '../../src/storage/types.js';

function item(content: string, relevance: number, metadata: Payload = {}, source: ContextSource = 'memory'): ContextItem {
  return { source, content, relevance, metadata };
}

const base = Array.from({ length: 1000 }, (_, i) => 'abcdefghij'[i % 10]).join('');
const variant = base.slice(0, 999) + 'Z';

describe('canonicalKey', () => {
  it('checks fields in order', () => {
    expect(canonicalKey(item('x', 1, { ghap_id: 'g1', id: 'e1' }))).toBe('ghap:g1');
    expect(canonicalKey(item('x', 1, { file_path: 'src/a.ts', id: 'c1' }))).toBe('file:src/a.ts');
    expect(canonicalKey(item('x', 1, { sha: 'abc123' }))).toBe('commit:abc123');
    expect(canonicalKey(item('x', 1, { id: 7 }))).toBe('id:7');
  });

  it('skips empty values and reports no key', () => {
    expect(canonicalKey(item('x', 1, { ghap_id: '', id: 'e1' }))).toBe('id:e1');
    expect(canonicalKey(item('x', 1, {}))).toBeNull();
    expect(canonicalKey(item('x', 1, { id: null }))).toBeNull();
  });
});

describe('deduplicate', () => {
  it('keeps the most relevant copy of an item seen through two sources', () => {
    const fromExperience = item('Experience block', 0.8, { ghap_id: 'ghap_123', id: 'e1' }, 'experience');
    const fromMemory = item('Memory block', 0.9, { ghap_id: 'ghap_123', id: 'm1' }, 'memory');

    expect(deduplicate([fromExperience, fromMemory])).toEqual([fromMemory]);
  });

  it('keeps the first copy when relevance ties', () => {
    const first = item('first', 0.5, { id: 'a' });
    const second = item('second', 0.5, { id: 'a' });

    expect(deduplicate([first, second])).toEqual([first]);
  });

  it('drops near-identical text', () => {
    const kept = item('The cache must be invalidated after every deploy.', 0.7);
    const dropped = item('The cache must be invalidated after every deploy!', 0.6);
    const other = item('Retries need jitter.', 0.5);

    expect(deduplicate([dropped, other, kept])).toEqual([kept, other]);
  });

  it('honours the similarity threshold', () => {
    const a = item('The cache must be invalidated after every deploy.', 0.7);
    const b = item('The cache must be invalidated after every deploy!', 0.6);

    expect(deduplicate([a, b], { similarityThreshold: 1 })).toEqual([a, b]);
  });

  it('compares content up to the length limit', () => {
    const a = item(base, 0.9, { id: 'a' });
    const b = item(variant, 0.8, { id: 'b' });

    expect(deduplicate([a, b])).toEqual([a]);
  });

  it('leaves content over the length limit to exact matching', () => {
    const a = item(base + 'k', 0.9, { id: 'a' });
    const b = item(variant + 'k', 0.8, { id: 'b' });
    const c = item(base, 0.7, { id: 'c' });

    expect(deduplicate([a, b, c])).toEqual([a, b, c]);
  });

  it('measures the length limit in code points', () => {
    // 600 code points, 1200 UTF-16 units
    const a = item('😀'.repeat(600), 0.9, { id: 'a' });
    const b = item('😀'.repeat(599) + '😁', 0.8, { id: 'b' });

    expect(deduplicate([a, b])).toEqual([a]);
    expect(deduplicate([a, b], { maxFuzzyContentLength: 599 })).toEqual([a, b]);
  });

  it('orders the output by relevance and is idempotent', () => {
    const items = [
      item('alpha', 0.2, { id: '1' }),
      item('beta', 0.9, { id: '2' }),
      item('gamma', 0.5, { id: '1' }),
      item('delta', 0.4),
    ];

    const once = deduplicate(items);
    expect(once.map((i) => i.content)).toEqual(['beta', 'gamma', 'delta']);
    expect(deduplicate(once)).toEqual(once);
  });

  it('returns an empty list for no input', () => {
    expect(deduplicate([])).toEqual([]);
  });
});

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../src/errors.js';
import { defaultConfig } from '../../src/config/index.js';
import { allocateBudget, presentSources } from '../../src/context/allocate.js';
import { truncationMarker } from '../../src/context/tokens.js';
import type { ContextItem, ContextSource } from '../../src/context/types.js';
import type { Payload } from '../../src/storage/types.js';

const weights = defaultConfig().context.sourceWeights;

function item(source: ContextSource, id: string, content: string, relevance: number, metadata: Payload = {}): ContextItem {
  return { source, content, relevance, metadata: { id, ...metadata } };
}

describe('presentSources', () => {
  it('lists sources in canonical order', () => {
    expect(presentSources({ commit: [], memory: [] })).toEqual(['memory', 'commit']);
  });
});

describe('allocateBudget', () => {
  it('stops a source at the first item over its remaining budget', () => {
    const memories = Array.from({ length: 12 }, (_, i) => item('memory', `m${i}`, 'm'.repeat(40), 1 - i / 100));

    const allocation = allocateBudget({ memory: memories }, { weights, maxTokens: 100, maxItemFraction: 0.25 });

    expect(allocation.budgets).toEqual({ memory: 100 });
    expect(allocation.selected.memory?.map((m) => m.metadata.id)).toEqual(memories.slice(0, 10).map((m) => m.metadata.id));
    expect(allocation.usedTokens).toBe(100);
    expect(allocation.omittedCount).toBe(2);
    expect(allocation.truncated).toBe(true);
    expect(allocation.truncatedIds).toEqual([]);
  });

  it('takes items by relevance', () => {
    const low = item('memory', 'low', 'low', 0.2);
    const high = item('memory', 'high', 'high', 0.9);

    const allocation = allocateBudget({ memory: [low, high] }, { weights, maxTokens: 100, maxItemFraction: 0.25 });

    expect(allocation.selected.memory).toEqual([high, low]);
    expect(allocation.truncated).toBe(false);
  });

  it('truncates an oversized item to the per-item cap', () => {
    const metadata = { file_path: 'src/a.ts', line_start: 12 };
    const big = item('code', 'code-1', 'c'.repeat(400), 0.9, metadata);
    const marker = truncationMarker('code', big.metadata);

    // budget 200, cap 50 tokens = 203 characters at most
    const allocation = allocateBudget({ code: [big] }, { weights, maxTokens: 200, maxItemFraction: 0.25 });

    expect(allocation.selected.code?.[0].content).toBe('c'.repeat(203 - marker.length) + marker);
    expect(allocation.selected.code?.[0].relevance).toBe(0.9);
    expect(big.content).toBe('c'.repeat(400));
    expect(allocation.truncatedIds).toEqual(['code-1']);
    expect(allocation.usedTokens).toBe(50);
    expect(allocation.omittedCount).toBe(0);
    expect(allocation.truncated).toBe(true);
  });

  it('stops the source at an item too big to cut down to the cap', () => {
    const big = item('memory', 'big', 'm'.repeat(40), 0.9);
    const small = item('memory', 'small', 'ok', 0.5);

    // budget 16, cap floor(3.2) = 3, the plain marker costs 4
    const allocation = allocateBudget({ memory: [big, small] }, { weights, maxTokens: 16, maxItemFraction: 0.2 });

    expect(allocation.selected.memory).toEqual([]);
    expect(allocation.usedTokens).toBe(0);
    expect(allocation.omittedCount).toBe(2);
    expect(allocation.truncatedIds).toEqual([]);
    expect(allocation.truncated).toBe(true);
  });

  it('budgets requested sources even when they have no items', () => {
    const allocation = allocateBudget(
      { memory: [item('memory', 'm1', 'note', 0.5)] },
      { weights, maxTokens: 300, maxItemFraction: 0.25, sources: ['memory', 'code'] }
    );

    expect(allocation.budgets).toEqual({ memory: 100, code: 200 });
    expect(allocation.selected.code).toEqual([]);
    expect(allocation.selected.memory).toHaveLength(1);
  });

  it.each([0, 1.5, -0.1])('rejects maxItemFraction %s', (maxItemFraction) => {
    expect(() => allocateBudget({}, { weights, maxTokens: 100, maxItemFraction, sources: ['memory'] }))
      .toThrow(ValidationError);
  });
});

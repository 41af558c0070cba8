import { describe, expect, it } from 'vitest';

import {
  createSeededRandom,
  findTailEntities,
  sampleWithoutReplacement,
  touchesAny,
  type RandomSource,
} from '@/modules/tail-sampling/index.js';

/** Always picks the lowest index */
const firstPick: RandomSource = { nextInt: () => 0 };

/** Always picks the highest index */
const lastPick: RandomSource = { nextInt: (max) => max - 1 };

describe('findTailEntities', () => {
  const freq = new Map([
    ['hub', 9],
    ['rare', 1],
    ['mid', 3],
    ['edge', 2],
  ]);

  it('keeps entities at or below the threshold in first-seen order', () => {
    expect(findTailEntities(freq, 2)).toEqual(['rare', 'edge']);
    expect(findTailEntities(freq, 3)).toEqual(['rare', 'mid', 'edge']);
  });

  it('finds nothing when the threshold is below every count', () => {
    expect(findTailEntities(freq, 0)).toEqual([]);
  });
});

describe('touchesAny', () => {
  const tail = new Set(['x']);

  it('matches on subject or object, never on the relation', () => {
    expect(touchesAny({ subject: 'x', relation: 'r', object: 'y' }, tail)).toBe(true);
    expect(touchesAny({ subject: 'y', relation: 'r', object: 'x' }, tail)).toBe(true);
    expect(touchesAny({ subject: 'y', relation: 'x', object: 'z' }, tail)).toBe(false);
  });
});

describe('sampleWithoutReplacement', () => {
  const items = ['a', 'b', 'c', 'd', 'e'];

  it('returns every item in order when there are not more than requested', () => {
    expect(sampleWithoutReplacement(items, 5, firstPick)).toEqual(items);
    expect(sampleWithoutReplacement(items, 10, lastPick)).toEqual(items);
  });

  it('draws by partial shuffle', () => {
    expect(sampleWithoutReplacement(items, 2, firstPick)).toEqual(['a', 'b']);
    expect(sampleWithoutReplacement(items, 2, lastPick)).toEqual(['e', 'a']);
  });

  it('returns nothing for a zero sample size', () => {
    expect(sampleWithoutReplacement(items, 0, firstPick)).toEqual([]);
  });

  it('never repeats an item', () => {
    const sample = sampleWithoutReplacement(items, 4, createSeededRandom(7));

    expect(sample).toHaveLength(4);
    expect(new Set(sample).size).toBe(4);
    for (const item of sample) {
      expect(items).toContain(item);
    }
  });

  it('does not modify the input', () => {
    sampleWithoutReplacement(items, 3, lastPick);
    expect(items).toEqual(['a', 'b', 'c', 'd', 'e']);
  });
});

describe('createSeededRandom', () => {
  it('repeats its draws for the same seed', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const drawsA = Array.from({ length: 20 }, () => a.nextInt(1000));
    const drawsB = Array.from({ length: 20 }, () => b.nextInt(1000));

    expect(drawsA).toEqual(drawsB);
  });

  it('stays within range', () => {
    const random = createSeededRandom(0);
    for (let i = 0; i < 200; i++) {
      const value = random.nextInt(3);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(3);
      expect(Number.isInteger(value)).toBe(true);
    }
  });

  it('rejects an empty range', () => {
    expect(() => createSeededRandom(1).nextInt(0)).toThrow(RangeError);
  });
});

/**
 * Unit tests for the sampleTailEntities use case
 */

import { describe, expect, it } from 'vitest';

import {
  createSeededRandom,
  sampleTailEntities,
  type RandomSource,
} from '@/modules/tail-sampling/index.js';

import { makeFakeLineReader, testLogger } from '../../fixtures/fakes.js';

const SPLIT = '/kg/yago15k/yago15k_train.txt';

const firstPick: RandomSource = { nextInt: () => 0 };

const lines = [
  'hub\tr\ta',
  'hub\tr\tb',
  'hub\tr\tc',
  'a\tr\thub',
  'rare\tr\thub',
  '',
  'short\tline',
];

describe('sampleTailEntities use case', () => {
  it('finds tail entities and samples the triples that touch them', async () => {
    const reader = makeFakeLineReader(new Map([[SPLIT, lines]]));

    const result = await sampleTailEntities(
      { readLines: reader.readLines, random: firstPick, logger: testLogger },
      { filePath: SPLIT, maxFrequency: 1, sampleSize: 2 }
    );

    expect(result.isOk()).toBe(true);
    const sample = result._unsafeUnwrap();
    expect(sample.tailEntities).toEqual(['b', 'c', 'rare']);
    expect(sample.tailTripleCount).toBe(3);
    expect(sample.samples).toEqual([
      { subject: 'hub', relation: 'r', object: 'b' },
      { subject: 'hub', relation: 'r', object: 'c' },
    ]);
    expect(reader.opened).toEqual([SPLIT, SPLIT]);
  });

  it('returns every tail triple when the sample size exceeds them', async () => {
    const reader = makeFakeLineReader(new Map([[SPLIT, lines]]));

    const result = await sampleTailEntities(
      { readLines: reader.readLines, random: createSeededRandom(3), logger: testLogger },
      { filePath: SPLIT, maxFrequency: 2, sampleSize: 50 }
    );

    const sample = result._unsafeUnwrap();
    expect(sample.tailEntities).toEqual(['a', 'b', 'c', 'rare']);
    expect(sample.tailTripleCount).toBe(5);
    expect(sample.samples).toHaveLength(5);
  });

  it('gives the same sample for the same seed', async () => {
    const run = async () => {
      const reader = makeFakeLineReader(new Map([[SPLIT, lines]]));
      const result = await sampleTailEntities(
        { readLines: reader.readLines, random: createSeededRandom(42), logger: testLogger },
        { filePath: SPLIT, maxFrequency: 2, sampleSize: 2 }
      );
      return result._unsafeUnwrap().samples;
    };

    expect(await run()).toEqual(await run());
  });

  it('skips the second pass when no entity is rare enough', async () => {
    const reader = makeFakeLineReader(new Map([[SPLIT, lines]]));

    const result = await sampleTailEntities(
      { readLines: reader.readLines, random: firstPick, logger: testLogger },
      { filePath: SPLIT, maxFrequency: 0, sampleSize: 10 }
    );

    expect(result._unsafeUnwrap()).toEqual({ tailEntities: [], tailTripleCount: 0, samples: [] });
    expect(reader.opened).toEqual([SPLIT]);
  });

  it('fails with NoTriples for a split without triples', async () => {
    const reader = makeFakeLineReader(new Map([[SPLIT, ['', 'only\ttwo']]]));

    const result = await sampleTailEntities(
      { readLines: reader.readLines, random: firstPick, logger: testLogger },
      { filePath: SPLIT, maxFrequency: 5, sampleSize: 10 }
    );

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'NoTriples',
      message: `No triples found in ${SPLIT}.`,
      path: SPLIT,
    });
  });

  it('propagates read errors', async () => {
    const reader = makeFakeLineReader(new Map());

    const result = await sampleTailEntities(
      { readLines: reader.readLines, random: firstPick, logger: testLogger },
      { filePath: SPLIT, maxFrequency: 5, sampleSize: 10 }
    );

    expect(result._unsafeUnwrapErr().type).toBe('ReadError');
  });
});

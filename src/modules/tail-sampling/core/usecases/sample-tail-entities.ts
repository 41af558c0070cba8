/**
 * Sample Tail Entities Use Case
 *
 * Finds low-frequency entities of a split and samples triples touching them.
 * The split is streamed twice: once through the stats accumulator for entity
 * frequencies, once to collect the matching triples.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  accumulateFile,
  parseTripleLine,
  type LineReader,
  type Triple,
} from '../../../kg-stats/index.js';
import { createNoTriplesError, type TailSamplingError } from '../errors.js';
import { findTailEntities, sampleWithoutReplacement, touchesAny } from '../tail.js';

import type { RandomSource } from '../random.js';
import type { Logger } from 'pino';

export interface SampleTailEntitiesDeps {
  readLines: LineReader;
  random: RandomSource;
  logger: Logger;
}

export interface SampleTailEntitiesInput {
  filePath: string;
  /** Entities seen at most this many times are part of the tail */
  maxFrequency: number;
  sampleSize: number;
}

export interface TailSample {
  tailEntities: string[];
  /** Number of triples touching a tail entity, before sampling */
  tailTripleCount: number;
  samples: Triple[];
}

export const sampleTailEntities = async (
  deps: SampleTailEntitiesDeps,
  input: SampleTailEntitiesInput
): Promise<Result<TailSample, TailSamplingError>> => {
  const log = deps.logger.child({ usecase: 'sampleTailEntities', file: input.filePath });

  // Entity frequency only depends on the first three columns.
  const statsResult = await accumulateFile(
    { readLines: deps.readLines },
    { filePath: input.filePath, datasetType: 'generic' }
  );
  if (statsResult.isErr()) {
    return err(statsResult.error);
  }

  const stats = statsResult.value;
  if (stats.tripleCount === 0) {
    return err(createNoTriplesError(input.filePath));
  }

  const tailEntities = findTailEntities(stats.entityFreq, input.maxFrequency);
  log.debug(
    { triples: stats.tripleCount, tailEntities: tailEntities.length },
    'Entity frequencies computed'
  );

  if (tailEntities.length === 0) {
    return ok({ tailEntities, tailTripleCount: 0, samples: [] });
  }

  const tailSet = new Set(tailEntities);
  const tailTriples: Triple[] = [];

  const readResult = await deps.readLines(input.filePath, (line) => {
    const parsed = parseTripleLine(line);
    if (parsed !== null && touchesAny(parsed.triple, tailSet)) {
      tailTriples.push(parsed.triple);
    }
  });
  if (readResult.isErr()) {
    return err(readResult.error);
  }

  return ok({
    tailEntities,
    tailTripleCount: tailTriples.length,
    samples: sampleWithoutReplacement(tailTriples, input.sampleSize, deps.random),
  });
};

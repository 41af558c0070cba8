import { Type } from '@sinclair/typebox';
import { err, ok } from 'neverthrow';

import { parseCliOptions, type OptionTable } from '../../infra/cli/args.js';
import { readFileLines } from '../../modules/kg-stats/index.js';
import {
  createMathRandom,
  createSeededRandom,
  sampleTailEntities,
} from '../../modules/tail-sampling/index.js';

import type { Command } from '../runtime.js';

export const SAMPLE_TAIL_OPTIONS: OptionTable = {
  dataset: 'value',
  'max-frequency': 'value',
  'sample-size': 'value',
  seed: 'value',
};

export const SampleTailOptionsSchema = Type.Object({
  /** Path to the dataset split (tab-separated) */
  dataset: Type.String({ minLength: 1 }),
  /** Maximum frequency for entities considered part of the tail */
  maxFrequency: Type.Integer({ default: 5 }),
  /** Number of tail triples to sample */
  sampleSize: Type.Integer({ minimum: 0, default: 10 }),
  /** Optional random seed for reproducibility */
  seed: Type.Optional(Type.Integer()),
});

/**
 * Sample triples that involve entities with low frequency.
 *
 * Usage:
 *   sample-tail-entities --dataset TemporalKGs/yago15k/yago15k_train.txt
 *   sample-tail-entities --dataset <split> --max-frequency 3 --sample-size 20 --seed 42
 */
export const runSampleTailCommand: Command = async (argv, runtime) => {
  const optionsResult = parseCliOptions(argv, SAMPLE_TAIL_OPTIONS, SampleTailOptionsSchema);
  if (optionsResult.isErr()) {
    return err(optionsResult.error);
  }

  const options = optionsResult.value;
  const random =
    options.seed !== undefined ? createSeededRandom(options.seed) : createMathRandom();

  const sampleResult = await sampleTailEntities(
    { readLines: readFileLines, random, logger: runtime.logger },
    {
      filePath: options.dataset,
      maxFrequency: options.maxFrequency,
      sampleSize: options.sampleSize,
    }
  );
  if (sampleResult.isErr()) {
    return err(sampleResult.error);
  }

  const { tailEntities, samples } = sampleResult.value;
  if (tailEntities.length === 0) {
    runtime.print('No entities fall below the specified frequency threshold.');
    return ok(undefined);
  }

  runtime.print(`Found ${String(tailEntities.length)} tail entities.`);
  runtime.print(`Showing ${String(samples.length)} sampled triples:`);
  for (const triple of samples) {
    runtime.print(`${triple.subject}\t${triple.relation}\t${triple.object}`);
  }

  return ok(undefined);
};

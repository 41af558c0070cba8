import { Type } from '@sinclair/typebox';
import { err, ok } from 'neverthrow';

import { parseCliOptions, type OptionTable } from '../../infra/cli/args.js';
import {
  joinLabelsIntoFile,
  readLabelMapping,
  resolveDelimiter,
} from '../../modules/entity-labels/index.js';

import type { Command } from '../runtime.js';

export const JOIN_LABELS_OPTIONS: OptionTable = {
  dataset: 'value',
  mapping: 'value',
  output: 'value',
  delimiter: 'value',
  'missing-value': 'value',
};

export const JoinLabelsOptionsSchema = Type.Object({
  /** Split to annotate */
  dataset: Type.String({ minLength: 1 }),
  /** id -> label file produced by build-label-mapping */
  mapping: Type.String({ minLength: 1 }),
  /** Defaults to `<dataset>.labeled` */
  output: Type.Optional(Type.String({ minLength: 1 })),
  delimiter: Type.String({ minLength: 1, default: '\\t' }),
  /** Placeholder for ids without a label */
  missingValue: Type.String({ default: '' }),
});

/**
 * Append subject and object labels to every row of a split.
 *
 * Usage:
 *   join-entity-labels --dataset TemporalKGs/wikidata/wiki_train.txt \
 *                      --mapping data/wikidata_labels.tsv [--missing-value UNKNOWN]
 */
export const runJoinEntityLabelsCommand: Command = async (argv, runtime) => {
  const optionsResult = parseCliOptions(argv, JOIN_LABELS_OPTIONS, JoinLabelsOptionsSchema);
  if (optionsResult.isErr()) {
    return err(optionsResult.error);
  }

  const options = optionsResult.value;

  const delimiterResult = resolveDelimiter(options.delimiter);
  if (delimiterResult.isErr()) {
    return err(delimiterResult.error);
  }
  const delimiter = delimiterResult.value;

  const mappingResult = await readLabelMapping(options.mapping, delimiter);
  if (mappingResult.isErr()) {
    return err(mappingResult.error);
  }

  const joinResult = await joinLabelsIntoFile({
    datasetPath: options.dataset,
    outputPath: options.output,
    mapping: mappingResult.value,
    delimiter,
    missingValue: options.missingValue,
  });
  if (joinResult.isErr()) {
    return err(joinResult.error);
  }

  const { outputPath, rowsWritten, rowsLabeled } = joinResult.value;
  runtime.logger.info({ rowsWritten, rowsLabeled }, 'Joined entity labels');
  runtime.print(`Wrote labeled dataset to ${outputPath}`);
  return ok(undefined);
};

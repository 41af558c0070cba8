import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';

import { Type } from '@sinclair/typebox';
import { err, ok } from 'neverthrow';

import { parseCliOptions, type OptionTable } from '../../infra/cli/args.js';
import {
  buildLabelMapping,
  createWikidataLabelLookup,
  writeLabelMapping,
} from '../../modules/entity-labels/index.js';
import { createFsDatasetCatalog, readFileLines } from '../../modules/kg-stats/index.js';

import type { Command } from '../runtime.js';

export const LABEL_MAPPING_OPTIONS: OptionTable = {
  'dataset-dir': 'value',
  output: 'value',
  language: 'value',
  sleep: 'value',
};

export const LabelMappingOptionsSchema = Type.Object({
  /** Folder containing the Wikidata-derived splits */
  datasetDir: Type.String({ minLength: 1, default: path.join('TemporalKGs', 'wikidata') }),
  /** Where to write the id -> label TSV */
  output: Type.String({ minLength: 1, default: path.join('data', 'wikidata_labels.tsv') }),
  language: Type.String({ minLength: 1, default: 'en' }),
  /** Seconds to wait between API requests */
  sleep: Type.Number({ minimum: 0, default: 0.1 }),
});

/**
 * Fetch English (or other language) labels for every Wikidata entity id in a
 * dataset folder and store them as a TSV mapping.
 *
 * Usage:
 *   build-label-mapping --dataset-dir TemporalKGs/wikidata --output data/wikidata_labels.tsv
 *   build-label-mapping --language de --sleep 0.5
 */
export const runBuildLabelMappingCommand: Command = async (argv, runtime) => {
  const optionsResult = parseCliOptions(argv, LABEL_MAPPING_OPTIONS, LabelMappingOptionsSchema);
  if (optionsResult.isErr()) {
    return err(optionsResult.error);
  }

  const options = optionsResult.value;
  const dataset = {
    name: path.basename(path.resolve(options.datasetDir)),
    absolutePath: path.resolve(options.datasetDir),
  };

  const catalog = createFsDatasetCatalog({
    baseDir: path.dirname(dataset.absolutePath),
    splitExtension: runtime.config.datasets.splitExtension,
  });
  const lookup = createWikidataLabelLookup({ apiUrl: runtime.config.labels.apiUrl });

  const mappingResult = await buildLabelMapping(
    {
      catalog,
      readLines: readFileLines,
      lookup,
      sleep: async (ms) => {
        await delay(ms);
      },
      logger: runtime.logger,
    },
    {
      dataset,
      language: options.language,
      delayMs: Math.round(options.sleep * 1000),
    }
  );
  if (mappingResult.isErr()) {
    return err(mappingResult.error);
  }

  const writeResult = await writeLabelMapping(options.output, mappingResult.value);
  if (writeResult.isErr()) {
    return err(writeResult.error);
  }

  runtime.print(`Wrote ${String(mappingResult.value.size)} labels to ${options.output}`);
  return ok(undefined);
};

import { err, ok, type Result } from 'neverthrow';

import { accumulateFile } from './accumulate-file.js';
import { classifyDataset } from '../classify.js';
import { emptyStats, mergeStats } from '../merge.js';

import type { ReadError } from '../errors.js';
import type { DatasetCatalog, LineReader } from '../ports.js';
import type { DatasetEntry, DatasetStats, Stats } from '../types.js';
import type { Logger } from 'pino';

export interface CollectDatasetStatsDeps {
  catalog: DatasetCatalog;
  readLines: LineReader;
  logger: Logger;
}

/**
 * Classifies a dataset once, accumulates each of its split files in sorted
 * order and folds the per-file values into the dataset aggregate.
 * Stops at the first unreadable file.
 */
export const collectDatasetStats = async (
  deps: CollectDatasetStatsDeps,
  dataset: DatasetEntry
): Promise<Result<DatasetStats, ReadError>> => {
  const datasetType = classifyDataset(dataset.name);
  const log = deps.logger.child({ dataset: dataset.name, datasetType });

  const filesResult = await deps.catalog.listSplitFiles(dataset);
  if (filesResult.isErr()) {
    return err(filesResult.error);
  }

  const splitFiles = filesResult.value;
  log.info({ files: splitFiles.length }, 'Processing dataset');

  let aggregate = emptyStats();
  const files = new Map<string, Stats>();

  for (const file of splitFiles) {
    const statsResult = await accumulateFile(
      { readLines: deps.readLines },
      { filePath: file.absolutePath, datasetType }
    );
    if (statsResult.isErr()) {
      log.error({ file: file.name, error: statsResult.error.message }, 'Failed to read split');
      return err(statsResult.error);
    }

    const stats = statsResult.value;
    log.debug({ file: file.name, triples: stats.tripleCount }, 'Split processed');

    aggregate = mergeStats(aggregate, stats);
    files.set(file.name, stats);
  }

  return ok({ dataset, datasetType, aggregate, files });
};

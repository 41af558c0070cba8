/**
 * Build Label Mapping Use Case
 *
 * Collects Wikidata-style entity ids from every split of a dataset folder and
 * resolves their labels in fixed-size batches.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  accumulateFile,
  classifyDataset,
  mergeStats,
  emptyStats,
  type DatasetCatalog,
  type DatasetEntry,
  type LineReader,
} from '../../../kg-stats/index.js';
import { createNoEntityIdsError, type EntityLabelsError } from '../errors.js';
import { chunk, collectEntityIds, compareIds, MAX_IDS_PER_REQUEST } from '../labels.js';

import type { LabelLookup, Sleep } from '../ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface BuildLabelMappingDeps {
  catalog: DatasetCatalog;
  readLines: LineReader;
  lookup: LabelLookup;
  sleep: Sleep;
  logger: Logger;
}

export interface BuildLabelMappingInput {
  dataset: DatasetEntry;
  language: string;
  /** Pause between requests; 0 disables it */
  delayMs: number;
  batchSize?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Returns id -> label, ordered by id.
 */
export const buildLabelMapping = async (
  deps: BuildLabelMappingDeps,
  input: BuildLabelMappingInput
): Promise<Result<Map<string, string>, EntityLabelsError>> => {
  const log = deps.logger.child({ usecase: 'buildLabelMapping', dataset: input.dataset.name });
  const batchSize = input.batchSize ?? MAX_IDS_PER_REQUEST;

  const filesResult = await deps.catalog.listSplitFiles(input.dataset);
  if (filesResult.isErr()) {
    return err(filesResult.error);
  }

  const datasetType = classifyDataset(input.dataset.name);
  let stats = emptyStats();

  for (const file of filesResult.value) {
    const fileStats = await accumulateFile(
      { readLines: deps.readLines },
      { filePath: file.absolutePath, datasetType }
    );
    if (fileStats.isErr()) {
      return err(fileStats.error);
    }
    stats = mergeStats(stats, fileStats.value);
  }

  const entityIds = collectEntityIds(stats);
  if (entityIds.length === 0) {
    return err(createNoEntityIdsError(input.dataset.absolutePath));
  }

  const mapping = new Map<string, string>();
  const batches = chunk(entityIds, batchSize);
  let fetched = 0;

  for (const [index, batch] of batches.entries()) {
    const labelsResult = await deps.lookup.fetchLabels(batch, input.language);
    if (labelsResult.isErr()) {
      log.error({ batch: index + 1, error: labelsResult.error.message }, 'Label lookup failed');
      return err(labelsResult.error);
    }

    for (const [id, label] of labelsResult.value) {
      mapping.set(id, label);
    }

    fetched += batch.length;
    log.info({ fetched, total: entityIds.length }, 'Fetched entity labels');

    if (input.delayMs > 0 && index < batches.length - 1) {
      await deps.sleep(input.delayMs);
    }
  }

  return ok(new Map([...mapping].sort(([a], [b]) => compareIds(a, b))));
};

/**
 * Analyze Datasets Use Case
 *
 * Computes per-dataset (and optionally per-split) summaries for every
 * selected dataset folder.
 */

import { err, ok, type Result } from 'neverthrow';

import { collectDatasetStats } from './collect-dataset-stats.js';
import { createNoDatasetsFoundError, type KgStatsError } from '../errors.js';
import { summarizeStats } from '../summarize.js';

import type { DatasetCatalog, LineReader } from '../ports.js';
import type {
  AnalysisResult,
  AnalyzeDatasetsInput,
  DatasetEntry,
  Summary,
} from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface AnalyzeDatasetsDeps {
  catalog: DatasetCatalog;
  readLines: LineReader;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Keeps the datasets whose name matches one of `include`, ignoring case.
 * An empty or absent filter keeps everything.
 */
export const filterDatasets = (
  datasets: readonly DatasetEntry[],
  include: readonly string[] | undefined
): DatasetEntry[] => {
  if (include === undefined || include.length === 0) {
    return [...datasets];
  }

  const wanted = new Set(include.map((name) => name.toLowerCase()));
  return datasets.filter((dataset) => wanted.has(dataset.name.toLowerCase()));
};

/**
 * Lists and filters dataset folders; an empty selection is a NoDatasetsFound
 * error, raised before any split file is opened.
 */
export const selectDatasets = async (
  catalog: DatasetCatalog,
  include: readonly string[] | undefined
): Promise<Result<DatasetEntry[], KgStatsError>> => {
  const listResult = await catalog.listDatasets();
  if (listResult.isErr()) {
    return err(listResult.error);
  }

  const selected = filterDatasets(listResult.value, include);
  if (selected.length === 0) {
    return err(createNoDatasetsFoundError(catalog.baseDir, include ?? []));
  }

  return ok(selected);
};

/**
 * Processes the selected datasets one after another.
 * Fail-fast: the first read error aborts the whole run and nothing is returned.
 */
export const analyzeDatasets = async (
  deps: AnalyzeDatasetsDeps,
  input: AnalyzeDatasetsInput
): Promise<Result<AnalysisResult, KgStatsError>> => {
  const log = deps.logger.child({ usecase: 'analyzeDatasets' });

  const selectResult = await selectDatasets(deps.catalog, input.include);
  if (selectResult.isErr()) {
    return err(selectResult.error);
  }

  const datasets = selectResult.value;
  log.info({ datasets: datasets.map((d) => d.name) }, 'Analyzing datasets');

  const result: AnalysisResult = new Map();

  for (const dataset of datasets) {
    const statsResult = await collectDatasetStats(deps, dataset);
    if (statsResult.isErr()) {
      return err(statsResult.error);
    }

    const { aggregate, files } = statsResult.value;
    const fileSummaries = new Map<string, Summary>();

    if (input.perFile) {
      for (const [fileName, stats] of files) {
        fileSummaries.set(fileName, summarizeStats(stats, input.topN));
      }
    }

    result.set(dataset.name, {
      aggregate: summarizeStats(aggregate, input.topN),
      files: fileSummaries,
    });
  }

  log.info({ datasets: result.size }, 'Analysis complete');

  return ok(result);
};

import { err, ok, type Result } from 'neverthrow';

import {
  collectDatasetStats,
  selectDatasets,
  type DatasetCatalog,
  type KgStatsError,
  type LineReader,
} from '../../../kg-stats/index.js';

import type { BuildYearlySeriesInput, YearlyCountPoint, YearlySeries } from '../types.js';
import type { Logger } from 'pino';

export interface BuildYearlySeriesDeps {
  catalog: DatasetCatalog;
  readLines: LineReader;
  logger: Logger;
}

/**
 * Ascending-year points of a year frequency map.
 */
export const toYearlyPoints = (yearFreq: ReadonlyMap<number, number>): YearlyCountPoint[] =>
  Array.from(yearFreq, ([year, count]) => ({ year, count })).sort((a, b) => a.year - b.year);

/**
 * One yearly series per selected dataset. Years come from the shared
 * accumulator, so every convention counts years exactly as the statistics
 * report does. Datasets without any year get an empty series.
 */
export const buildYearlySeries = async (
  deps: BuildYearlySeriesDeps,
  input: BuildYearlySeriesInput
): Promise<Result<YearlySeries[], KgStatsError>> => {
  const selectResult = await selectDatasets(deps.catalog, input.include);
  if (selectResult.isErr()) {
    return err(selectResult.error);
  }

  const series: YearlySeries[] = [];

  for (const dataset of selectResult.value) {
    const statsResult = await collectDatasetStats(deps, dataset);
    if (statsResult.isErr()) {
      return err(statsResult.error);
    }

    const { datasetType, aggregate } = statsResult.value;
    series.push({
      dataset: dataset.name,
      datasetType,
      points: toYearlyPoints(aggregate.yearFreq),
    });
  }

  return ok(series);
};

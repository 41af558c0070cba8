import type { DatasetType } from '../../kg-stats/index.js';

export interface YearlyCountPoint {
  year: number;
  count: number;
}

/**
 * Triple counts per year for one dataset, ascending by year.
 */
export interface YearlySeries {
  dataset: string;
  datasetType: DatasetType;
  points: YearlyCountPoint[];
}

export interface BuildYearlySeriesInput {
  include?: readonly string[] | undefined;
}

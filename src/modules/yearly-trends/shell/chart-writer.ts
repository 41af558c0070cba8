import path from 'node:path';

import fse from 'fs-extra';
import { err, ok, type Result } from 'neverthrow';

import { renderBarChartSvg } from './svg-bar-chart.js';
import { createWriteError, type WriteError } from '../../kg-stats/index.js';

import type { YearlySeries } from '../core/types.js';

export const chartFileName = (dataset: string): string => `${dataset}_yearly_counts.svg`;

/**
 * Writes the series' bar chart under `outputDir`, creating the directory.
 * Resolves with the written path, or null for a series without years.
 */
export const writeYearlyChart = async (
  outputDir: string,
  series: YearlySeries
): Promise<Result<string | null, WriteError>> => {
  const svg = renderBarChartSvg(series.points, {
    title: `Yearly triple counts for ${series.dataset}`,
    xLabel: 'Year',
    yLabel: 'Triples',
  });
  if (svg === null) {
    return ok(null);
  }

  const outputPath = path.join(outputDir, chartFileName(series.dataset));
  try {
    await fse.outputFile(outputPath, svg, 'utf8');
  } catch (error) {
    return err(createWriteError(outputPath, error));
  }

  return ok(outputPath);
};

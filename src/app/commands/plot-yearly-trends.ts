import { Type } from '@sinclair/typebox';
import fse from 'fs-extra';
import { err, ok } from 'neverthrow';

import { parseCliOptions, type OptionTable } from '../../infra/cli/args.js';
import {
  createBaseDirNotFoundError,
  createFsDatasetCatalog,
  readFileLines,
} from '../../modules/kg-stats/index.js';
import { buildYearlySeries, writeYearlyChart } from '../../modules/yearly-trends/index.js';

import type { Command } from '../runtime.js';

export const PLOT_OPTIONS: OptionTable = {
  'base-dir': 'value',
  datasets: 'list',
  'output-dir': 'value',
};

export const makePlotOptionsSchema = (defaultBaseDir: string) =>
  Type.Object({
    baseDir: Type.String({ minLength: 1, default: defaultBaseDir }),
    /** Dataset folders to plot; all of them when omitted */
    datasets: Type.Optional(Type.Array(Type.String())),
    outputDir: Type.String({ minLength: 1, default: 'figures' }),
  });

/**
 * Bar charts of yearly triple counts, one SVG per dataset.
 *
 * Usage:
 *   plot-yearly-trends --output-dir figures/
 *   plot-yearly-trends --datasets icews05-15 wikidata
 */
export const runPlotYearlyTrendsCommand: Command = async (argv, runtime) => {
  const optionsResult = parseCliOptions(
    argv,
    PLOT_OPTIONS,
    makePlotOptionsSchema(runtime.config.datasets.baseDir)
  );
  if (optionsResult.isErr()) {
    return err(optionsResult.error);
  }

  const options = optionsResult.value;

  if (!(await fse.pathExists(options.baseDir))) {
    return err(createBaseDirNotFoundError(options.baseDir));
  }

  const catalog = createFsDatasetCatalog({
    baseDir: options.baseDir,
    splitExtension: runtime.config.datasets.splitExtension,
  });

  const seriesResult = await buildYearlySeries(
    { catalog, readLines: readFileLines, logger: runtime.logger },
    { include: options.datasets }
  );
  if (seriesResult.isErr()) {
    return err(seriesResult.error);
  }

  for (const series of seriesResult.value) {
    const writeResult = await writeYearlyChart(options.outputDir, series);
    if (writeResult.isErr()) {
      return err(writeResult.error);
    }

    if (writeResult.value === null) {
      runtime.print(`[warn] Skipping ${series.dataset}: no yearly information found.`);
    } else {
      runtime.print(`[ok] Wrote ${writeResult.value}`);
    }
  }

  return ok(undefined);
};

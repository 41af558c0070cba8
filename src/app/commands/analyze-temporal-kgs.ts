import { Type } from '@sinclair/typebox';
import { err, ok } from 'neverthrow';

import { parseCliOptions, type OptionTable } from '../../infra/cli/args.js';
import {
  analyzeDatasets,
  createFsDatasetCatalog,
  readFileLines,
  renderAnalysisReport,
  writeReportFile,
} from '../../modules/kg-stats/index.js';

import type { Command } from '../runtime.js';

export const ANALYZE_OPTIONS: OptionTable = {
  'base-dir': 'value',
  datasets: 'list',
  'top-n': 'value',
  'json-output': 'value',
  'per-file': 'flag',
};

export const makeAnalyzeOptionsSchema = (defaultBaseDir: string) =>
  Type.Object({
    /** Folder containing dataset subdirectories */
    baseDir: Type.String({ minLength: 1, default: defaultBaseDir }),
    /** Optional subset of dataset folders, matched by name */
    datasets: Type.Optional(Type.Array(Type.String())),
    /** Number of top entities/relations to report */
    topN: Type.Integer({ minimum: 0, default: 5 }),
    /** Where to write the full statistics as JSON */
    jsonOutput: Type.Optional(Type.String({ minLength: 1 })),
    /** Include per-split summaries in the JSON output and console log */
    perFile: Type.Boolean({ default: false }),
  });

/**
 * Compute descriptive statistics for the datasets under a base directory.
 *
 * Usage:
 *   analyze-temporal-kgs [--base-dir TemporalKGs] [--datasets icews14 yago11k]
 *                        [--top-n 3] [--json-output stats.json] [--per-file]
 */
export const runAnalyzeCommand: Command = async (argv, runtime) => {
  const optionsResult = parseCliOptions(
    argv,
    ANALYZE_OPTIONS,
    makeAnalyzeOptionsSchema(runtime.config.datasets.baseDir)
  );
  if (optionsResult.isErr()) {
    return err(optionsResult.error);
  }

  const options = optionsResult.value;
  const catalog = createFsDatasetCatalog({
    baseDir: options.baseDir,
    splitExtension: runtime.config.datasets.splitExtension,
  });

  const analysis = await analyzeDatasets(
    { catalog, readLines: readFileLines, logger: runtime.logger },
    { include: options.datasets, topN: options.topN, perFile: options.perFile }
  );
  if (analysis.isErr()) {
    return err(analysis.error);
  }

  runtime.print(renderAnalysisReport(analysis.value, options.perFile).join('\n'));

  if (options.jsonOutput !== undefined) {
    const writeResult = await writeReportFile(options.jsonOutput, analysis.value);
    if (writeResult.isErr()) {
      return err(writeResult.error);
    }
    runtime.logger.info({ path: options.jsonOutput }, 'Wrote JSON report');
  }

  return ok(undefined);
};

import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { createWriteError, type WriteError } from '../../core/errors.js';

import type { AnalysisResult, Summary } from '../../core/types.js';

export interface DatasetReportDocument {
  aggregate: Summary;
  files: Record<string, Summary>;
}

export type ReportDocument = Record<string, DatasetReportDocument>;

/**
 * Plain-object projection of the analysis result. Summary keys keep the
 * data-model order; datasets and files keep the result's order.
 */
export const toReportDocument = (result: AnalysisResult): ReportDocument => {
  const document: ReportDocument = {};

  for (const [dataset, report] of result) {
    document[dataset] = {
      aggregate: report.aggregate,
      files: Object.fromEntries(report.files),
    };
  }

  return document;
};

export const serializeReport = (result: AnalysisResult): string =>
  JSON.stringify(toReportDocument(result), null, 2);

/**
 * Writes the JSON document, creating missing parent directories.
 */
export const writeReportFile = async (
  outputPath: string,
  result: AnalysisResult
): Promise<Result<void, WriteError>> => {
  try {
    await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
    await fs.writeFile(outputPath, `${serializeReport(result)}\n`, 'utf8');
  } catch (error) {
    return err(createWriteError(outputPath, error));
  }

  return ok(undefined);
};

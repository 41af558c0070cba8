import path from 'node:path';
import { pipeline } from 'node:stream/promises';

import { parse } from 'csv-parse';
import fse from 'fs-extra';
import { err, ok, type Result } from 'neverthrow';

import { isStringRow, tsvParseOptions } from './mapping-file.js';
import { createReadError, createWriteError } from '../../kg-stats/index.js';
import { attachLabels } from '../core/labels.js';

import type { ReadError, WriteError } from '../../kg-stats/index.js';

export interface JoinLabelsInput {
  datasetPath: string;
  /** Defaults to `<datasetPath>.labeled` */
  outputPath?: string | undefined;
  mapping: ReadonlyMap<string, string>;
  delimiter: string;
  missingValue: string;
}

export interface JoinLabelsResult {
  outputPath: string;
  rowsWritten: number;
  rowsLabeled: number;
}

export const defaultLabeledPath = (datasetPath: string): string => `${datasetPath}.labeled`;

/**
 * Streams a split into a copy whose rows carry subject and object labels
 * after the object column. Blank lines are dropped.
 */
export const joinLabelsIntoFile = async (
  input: JoinLabelsInput
): Promise<Result<JoinLabelsResult, ReadError | WriteError>> => {
  const outputPath = input.outputPath ?? defaultLabeledPath(input.datasetPath);
  let rowsWritten = 0;
  let rowsLabeled = 0;

  try {
    const stats = await fse.stat(input.datasetPath);
    if (!stats.isFile()) {
      return err(createReadError(input.datasetPath, new Error('not a regular file')));
    }
  } catch (error) {
    return err(createReadError(input.datasetPath, error));
  }

  try {
    await fse.ensureDir(path.dirname(path.resolve(outputPath)));
  } catch (error) {
    return err(createWriteError(outputPath, error));
  }

  const source = fse.createReadStream(input.datasetPath, { encoding: 'utf8' });
  let sourceFailed = false;
  source.once('error', () => {
    sourceFailed = true;
  });

  try {
    await pipeline(
      source,
      parse(tsvParseOptions(input.delimiter)),
      async function* (records: AsyncIterable<unknown>) {
        for await (const record of records) {
          if (!isStringRow(record)) continue;

          const row = attachLabels(record, input.mapping, input.missingValue);
          if (row.length !== record.length) rowsLabeled++;
          rowsWritten++;
          yield `${row.join(input.delimiter)}\n`;
        }
      },
      fse.createWriteStream(outputPath, { encoding: 'utf8' })
    );
  } catch (error) {
    return err(
      sourceFailed
        ? createReadError(input.datasetPath, error)
        : createWriteError(outputPath, error)
    );
  }

  return ok({ outputPath, rowsWritten, rowsLabeled });
};

import { err, ok, type Result } from 'neverthrow';

import { createStatsAccumulator } from '../accumulator.js';

import type { ReadError } from '../errors.js';
import type { LineReader } from '../ports.js';
import type { DatasetType, Stats } from '../types.js';

export interface AccumulateFileDeps {
  readLines: LineReader;
}

export interface AccumulateFileInput {
  filePath: string;
  datasetType: DatasetType;
}

/**
 * Streams one split file through a fresh accumulator.
 */
export const accumulateFile = async (
  deps: AccumulateFileDeps,
  input: AccumulateFileInput
): Promise<Result<Stats, ReadError>> => {
  const accumulator = createStatsAccumulator(input.datasetType);

  const readResult = await deps.readLines(input.filePath, (line) => {
    accumulator.addLine(line);
  });
  if (readResult.isErr()) {
    return err(readResult.error);
  }

  return ok(accumulator.toStats());
};

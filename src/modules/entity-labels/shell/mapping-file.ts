import { parse } from 'csv-parse/sync';
import fse from 'fs-extra';
import { err, ok, type Result } from 'neverthrow';

import { createReadError, createWriteError } from '../../kg-stats/index.js';
import { createEmptyMappingError, type EntityLabelsError } from '../core/errors.js';

import type { WriteError } from '../../kg-stats/index.js';

/**
 * Options shared by every reader of tab-separated KG files: columns are taken
 * verbatim (quote characters are data) and rows may differ in width.
 */
export const tsvParseOptions = (delimiter: string) =>
  ({
    delimiter,
    quote: false,
    relax_column_count: true,
    skip_empty_lines: true,
  }) as const;

export const isStringRow = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((cell) => typeof cell === 'string');

/**
 * Parses `id<delimiter>label` rows. Ids and labels are trimmed, rows with an
 * empty id are skipped and a missing label column maps to ''.
 */
export const parseLabelMapping = (contents: string, delimiter: string): Map<string, string> => {
  const records: unknown = parse(contents, tsvParseOptions(delimiter));
  const mapping = new Map<string, string>();

  if (!Array.isArray(records)) {
    return mapping;
  }

  for (const record of records) {
    if (!isStringRow(record)) continue;

    const key = record[0]?.trim() ?? '';
    if (key === '') continue;

    mapping.set(key, record[1]?.trim() ?? '');
  }

  return mapping;
};

export const readLabelMapping = async (
  mappingPath: string,
  delimiter: string
): Promise<Result<Map<string, string>, EntityLabelsError>> => {
  let contents: string;
  try {
    contents = await fse.readFile(mappingPath, 'utf8');
  } catch (error) {
    return err(createReadError(mappingPath, error));
  }

  const mapping = parseLabelMapping(contents, delimiter);
  if (mapping.size === 0) {
    return err(createEmptyMappingError(mappingPath));
  }

  return ok(mapping);
};

export const formatLabelMapping = (mapping: ReadonlyMap<string, string>): string =>
  Array.from(mapping, ([id, label]) => `${id}\t${label}\n`).join('');

/**
 * Writes the mapping as `id\tlabel` lines, creating parent directories.
 */
export const writeLabelMapping = async (
  outputPath: string,
  mapping: ReadonlyMap<string, string>
): Promise<Result<void, WriteError>> => {
  try {
    await fse.outputFile(outputPath, formatLabelMapping(mapping), 'utf8');
  } catch (error) {
    return err(createWriteError(outputPath, error));
  }

  return ok(undefined);
};

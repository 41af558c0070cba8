import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidOptionsError,
  type InvalidOptionsError,
} from '../../../common/types/errors.js';

import type { Stats } from '../../kg-stats/index.js';

/** Wikidata API limit for `wbgetentities` */
export const MAX_IDS_PER_REQUEST = 50;

export const WIKIDATA_ENTITY_ID_RE = /^Q\d+$/;

export const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Subject and object ids that look like Wikidata entities, sorted.
 */
export const collectEntityIds = (stats: Stats): string[] => {
  const ids = new Set<string>();
  for (const candidate of [...stats.subjects, ...stats.objects]) {
    if (WIKIDATA_ENTITY_ID_RE.test(candidate)) {
      ids.add(candidate);
    }
  }
  return [...ids].sort(compareIds);
};

export const chunk = <T>(values: readonly T[], size: number): T[][] => {
  const result: T[][] = [];
  for (let index = 0; index < values.length; index += size) {
    result.push(values.slice(index, index + size));
  }
  return result;
};

/**
 * Inserts the subject and object labels right after the object column.
 * Rows under three columns are returned unchanged.
 */
export const attachLabels = (
  row: readonly string[],
  mapping: ReadonlyMap<string, string>,
  missingValue: string
): string[] => {
  const [subject, relation, object, ...rest] = row;
  if (subject === undefined || relation === undefined || object === undefined) {
    return [...row];
  }

  return [
    subject,
    relation,
    object,
    mapping.get(subject) ?? missingValue,
    mapping.get(object) ?? missingValue,
    ...rest,
  ];
};

const ESCAPES: Record<string, string> = {
  t: '\t',
  n: '\n',
  r: '\r',
  '\\': '\\',
  '0': '\0',
};

/**
 * Decodes a delimiter given on the command line, so `\t` means TAB.
 * It must come out as exactly one character.
 */
export const resolveDelimiter = (raw: string): Result<string, InvalidOptionsError> => {
  if (raw.length === 1) {
    return ok(raw);
  }

  const decoded = raw.replace(/\\(u[0-9a-fA-F]{4}|x[0-9a-fA-F]{2}|.)/g, (match, code: string) => {
    if (code.length > 1) {
      return String.fromCharCode(Number.parseInt(code.slice(1), 16));
    }
    return ESCAPES[code] ?? match;
  });

  if (decoded.length !== 1) {
    return err(
      createInvalidOptionsError(
        `Delimiter must resolve to a single character, got "${raw}". Use --delimiter '\\t' for tabs.`
      )
    );
  }

  return ok(decoded);
};

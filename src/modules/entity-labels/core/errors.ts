/**
 * Entity Labels Module - Domain Errors
 */

import type { ReadError, WriteError } from '../../kg-stats/index.js';

/**
 * No subject or object id in the dataset matches the lookup's id pattern.
 */
export interface NoEntityIdsError {
  readonly type: 'NoEntityIds';
  readonly message: string;
  readonly path: string;
}

/**
 * The mapping file has no usable row.
 */
export interface EmptyMappingError {
  readonly type: 'EmptyMapping';
  readonly message: string;
  readonly path: string;
}

/**
 * The remote lookup failed or answered with an unexpected payload.
 * Requests are never retried.
 */
export interface LabelFetchError {
  readonly type: 'LabelFetchError';
  readonly message: string;
  readonly status?: number;
  readonly cause?: unknown;
}

export type EntityLabelsError =
  | NoEntityIdsError
  | EmptyMappingError
  | LabelFetchError
  | ReadError
  | WriteError;

export const createNoEntityIdsError = (path: string): NoEntityIdsError => ({
  type: 'NoEntityIds',
  message: `No Wikidata entity identifiers found under ${path}`,
  path,
});

export const createEmptyMappingError = (path: string): EmptyMappingError => ({
  type: 'EmptyMapping',
  message: `No entries found in mapping file ${path}.`,
  path,
});

export const createLabelFetchError = (
  message: string,
  status?: number,
  cause?: unknown
): LabelFetchError => ({
  type: 'LabelFetchError',
  message,
  ...(status !== undefined && { status }),
  ...(cause !== undefined && { cause }),
});

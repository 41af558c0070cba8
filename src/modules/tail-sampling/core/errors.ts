import type { ReadError } from '../../kg-stats/index.js';

/**
 * The split contains no line with at least three columns.
 */
export interface NoTriplesError {
  readonly type: 'NoTriples';
  readonly message: string;
  readonly path: string;
}

export type TailSamplingError = NoTriplesError | ReadError;

export const createNoTriplesError = (path: string): NoTriplesError => ({
  type: 'NoTriples',
  message: `No triples found in ${path}.`,
  path,
});

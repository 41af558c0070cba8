import type { LabelFetchError } from './errors.js';
import type { Result } from 'neverthrow';

export interface LabelLookup {
  /**
   * Labels for one batch of ids. Ids the service knows without a label in
   * `language` map to the empty string.
   */
  fetchLabels(
    ids: readonly string[],
    language: string
  ): Promise<Result<Map<string, string>, LabelFetchError>>;
}

export type Sleep = (ms: number) => Promise<void>;

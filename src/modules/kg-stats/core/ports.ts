import type { Result } from 'neverthrow';

import type { ReadError } from './errors.js';
import type { DatasetEntry, SplitFileEntry } from './types.js';

export interface DatasetCatalog {
  /** Folder the datasets were discovered in, for messages */
  readonly baseDir: string;

  /**
   * Immediate dataset folders of the base directory, sorted by name.
   * A missing base directory yields an empty list.
   */
  listDatasets(): Promise<Result<DatasetEntry[], ReadError>>;

  /**
   * Split files of a dataset, sorted by name.
   */
  listSplitFiles(dataset: DatasetEntry): Promise<Result<SplitFileEntry[], ReadError>>;
}

/**
 * Streams a text file line by line (newline stripped), awaiting completion.
 * Resolves with the number of lines handed to `onLine`.
 */
export type LineReader = (
  filePath: string,
  onLine: (line: string) => void
) => Promise<Result<number, ReadError>>;

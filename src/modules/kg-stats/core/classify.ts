import type { DatasetType } from './types.js';

/**
 * Name fragments checked in order; the first match wins.
 */
const CONVENTION_PATTERNS: readonly (readonly [fragment: string, type: DatasetType])[] = [
  ['icews', 'event-calendar'],
  ['wikidata', 'linked-data'],
  ['yago', 'fact-extraction'],
];

/**
 * Guesses a dataset's temporal column convention from its folder name.
 * Unknown names fall back to 'generic'.
 */
export const classifyDataset = (datasetName: string): DatasetType => {
  const name = datasetName.toLowerCase();

  for (const [fragment, type] of CONVENTION_PATTERNS) {
    if (name.includes(fragment)) {
      return type;
    }
  }

  return 'generic';
};

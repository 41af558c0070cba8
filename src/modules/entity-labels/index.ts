// Use cases
export {
  buildLabelMapping,
  type BuildLabelMappingDeps,
  type BuildLabelMappingInput,
} from './core/usecases/build-label-mapping.js';

// Core
export {
  attachLabels,
  chunk,
  collectEntityIds,
  compareIds,
  resolveDelimiter,
  MAX_IDS_PER_REQUEST,
  WIKIDATA_ENTITY_ID_RE,
} from './core/labels.js';
export type { LabelLookup, Sleep } from './core/ports.js';

// Shell
export {
  createWikidataLabelLookup,
  buildLabelsUrl,
  type WikidataLabelLookupOptions,
} from './shell/wikidata-client.js';
export {
  parseLabelMapping,
  readLabelMapping,
  formatLabelMapping,
  writeLabelMapping,
} from './shell/mapping-file.js';
export {
  joinLabelsIntoFile,
  defaultLabeledPath,
  type JoinLabelsInput,
  type JoinLabelsResult,
} from './shell/join-file.js';

// Errors
export {
  createNoEntityIdsError,
  createEmptyMappingError,
  createLabelFetchError,
  type EntityLabelsError,
  type NoEntityIdsError,
  type EmptyMappingError,
  type LabelFetchError,
} from './core/errors.js';

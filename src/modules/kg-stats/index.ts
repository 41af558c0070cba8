// Core
export { classifyDataset } from './core/classify.js';
export { extractTemporal } from './core/temporal.js';
export { parseIsoDate, formatIsoDate, compareDates } from './core/calendar-date.js';
export {
  createStatsAccumulator,
  parseTripleLine,
  type StatsAccumulator,
} from './core/accumulator.js';
export { emptyStats, mergeStats, mergeAllStats } from './core/merge.js';
export { pickMin, pickMax, compareNumbers } from './core/extrema.js';
export { rankTop, summarizeStats } from './core/summarize.js';
export type { DatasetCatalog, LineReader } from './core/ports.js';

// Use cases
export { accumulateFile } from './core/usecases/accumulate-file.js';
export {
  collectDatasetStats,
  type CollectDatasetStatsDeps,
} from './core/usecases/collect-dataset-stats.js';
export {
  analyzeDatasets,
  filterDatasets,
  selectDatasets,
  type AnalyzeDatasetsDeps,
} from './core/usecases/analyze-datasets.js';

// Shell
export {
  createFsDatasetCatalog,
  type FsDatasetCatalogOptions,
} from './shell/repo/fs-catalog.js';
export { readFileLines } from './shell/repo/line-reader.js';
export { renderDatasetSummary, renderAnalysisReport } from './shell/render/text-report.js';
export {
  toReportDocument,
  serializeReport,
  writeReportFile,
  type ReportDocument,
  type DatasetReportDocument,
} from './shell/render/json-report.js';

// Types
export type {
  DatasetType,
  CalendarDate,
  TemporalFields,
  Triple,
  TripleLine,
  Stats,
  RankedEntry,
  Summary,
  DatasetEntry,
  SplitFileEntry,
  DatasetStats,
  DatasetReport,
  AnalysisResult,
  AnalyzeDatasetsInput,
} from './core/types.js';

// Errors
export {
  createNoDatasetsFoundError,
  createBaseDirNotFoundError,
  createReadError,
  createWriteError,
  type KgStatsError,
  type NoDatasetsFoundError,
  type BaseDirNotFoundError,
  type ReadError,
  type WriteError,
} from './core/errors.js';

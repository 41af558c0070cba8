/**
 * Temporal KG statistics - domain types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Dataset conventions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Column layout used by a dataset to carry temporal information.
 *
 * - event-calendar: ICEWS-style, column 4 is a `YYYY-MM-DD` event date
 * - linked-data: Wikidata-style, column 4 is a marker, column 5 a year
 * - fact-extraction: YAGO-style, column 4 is a `<marker>`, column 5 a quoted date
 * - generic: no temporal columns are read
 */
export type DatasetType = 'event-calendar' | 'linked-data' | 'fact-extraction' | 'generic';

export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

/**
 * Temporal contribution of a single line.
 * A present `marker` counts the line as an explicit temporal record.
 */
export interface TemporalFields {
  readonly marker?: string;
  readonly year?: number;
  readonly date?: CalendarDate;
}

export interface Triple {
  readonly subject: string;
  readonly relation: string;
  readonly object: string;
}

/**
 * Tab-split line that passed the three-column minimum.
 * `columns` keeps every column, including the leading three.
 */
export interface TripleLine {
  readonly triple: Triple;
  readonly columns: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Statistics
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Running statistics for one split file, or the merge of several.
 * Frequency maps keep first-insertion order.
 */
export interface Stats {
  readonly tripleCount: number;
  readonly subjects: ReadonlySet<string>;
  readonly objects: ReadonlySet<string>;
  readonly relations: ReadonlySet<string>;
  readonly subjectFreq: ReadonlyMap<string, number>;
  readonly objectFreq: ReadonlyMap<string, number>;
  readonly entityFreq: ReadonlyMap<string, number>;
  readonly relationFreq: ReadonlyMap<string, number>;
  readonly yearFreq: ReadonlyMap<number, number>;
  readonly markerFreq: ReadonlyMap<string, number>;
  readonly temporalRecordCount: number;
  readonly minDate: CalendarDate | null;
  readonly maxDate: CalendarDate | null;
  readonly minYear: number | null;
  readonly maxYear: number | null;
}

export interface RankedEntry<K> {
  key: K;
  count: number;
}

/**
 * Read-only report derived from a Stats value.
 * Field order is the key order of the JSON document.
 */
export interface Summary {
  tripleCount: number;
  uniqueSubjects: number;
  uniqueObjects: number;
  uniqueRelations: number;
  topEntities: RankedEntry<string>[];
  topSubjects: RankedEntry<string>[];
  topObjects: RankedEntry<string>[];
  topRelations: RankedEntry<string>[];
  topYears: RankedEntry<number>[];
  topMarkers: RankedEntry<string>[];
  temporalRecordCount: number;
  /** ISO `YYYY-MM-DD` */
  minDate: string | null;
  maxDate: string | null;
  minYear: number | null;
  maxYear: number | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Discovery & orchestration
// ─────────────────────────────────────────────────────────────────────────────

export interface DatasetEntry {
  name: string;
  absolutePath: string;
}

export interface SplitFileEntry {
  name: string;
  absolutePath: string;
}

export interface DatasetStats {
  dataset: DatasetEntry;
  datasetType: DatasetType;
  aggregate: Stats;
  /** Per-file stats in sorted file-name order */
  files: Map<string, Stats>;
}

export interface DatasetReport {
  aggregate: Summary;
  /** Empty unless per-file summaries were requested */
  files: Map<string, Summary>;
}

/**
 * Dataset name -> report, in sorted dataset-name order.
 */
export type AnalysisResult = Map<string, DatasetReport>;

export interface AnalyzeDatasetsInput {
  /** Case-insensitive dataset names; empty or absent selects every dataset */
  include?: readonly string[] | undefined;
  topN: number;
  perFile: boolean;
}

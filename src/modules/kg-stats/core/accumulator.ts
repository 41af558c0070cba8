import { compareDates } from './calendar-date.js';
import { compareNumbers, pickMax, pickMin } from './extrema.js';
import { extractTemporal } from './temporal.js';

import type { CalendarDate, DatasetType, Stats, TripleLine } from './types.js';

const COLUMN_DELIMITER = '\t';

/**
 * Splits one raw line into a triple plus its trailing columns.
 * Blank lines and lines with fewer than three columns yield null.
 */
export const parseTripleLine = (rawLine: string): TripleLine | null => {
  const line = rawLine.trim();
  if (line === '') {
    return null;
  }

  const columns = line.split(COLUMN_DELIMITER);
  const [subject, relation, object] = columns;
  if (subject === undefined || relation === undefined || object === undefined) {
    return null;
  }

  return { triple: { subject, relation, object }, columns };
};

const increment = <K>(map: Map<K, number>, key: K, by = 1): void => {
  map.set(key, (map.get(key) ?? 0) + by);
};

export interface StatsAccumulator {
  /**
   * Feeds one raw line. Returns false when the line was skipped
   * (blank or under three columns).
   */
  addLine(rawLine: string): boolean;

  /**
   * Snapshot of everything accumulated so far.
   */
  toStats(): Stats;
}

/**
 * Creates the per-file accumulator. Its counters are private: the only way
 * out is `toStats()`, which hands back an independent copy.
 */
export const createStatsAccumulator = (datasetType: DatasetType): StatsAccumulator => {
  let tripleCount = 0;
  let temporalRecordCount = 0;
  let minDate: CalendarDate | null = null;
  let maxDate: CalendarDate | null = null;
  let minYear: number | null = null;
  let maxYear: number | null = null;

  const subjects = new Set<string>();
  const objects = new Set<string>();
  const relations = new Set<string>();
  const subjectFreq = new Map<string, number>();
  const objectFreq = new Map<string, number>();
  const entityFreq = new Map<string, number>();
  const relationFreq = new Map<string, number>();
  const yearFreq = new Map<number, number>();
  const markerFreq = new Map<string, number>();

  return {
    addLine(rawLine: string): boolean {
      const parsed = parseTripleLine(rawLine);
      if (parsed === null) {
        return false;
      }

      const { subject, relation, object } = parsed.triple;

      tripleCount++;
      subjects.add(subject);
      objects.add(object);
      relations.add(relation);
      increment(subjectFreq, subject);
      increment(objectFreq, object);
      increment(entityFreq, subject);
      increment(entityFreq, object);
      increment(relationFreq, relation);

      const temporal = extractTemporal(parsed.columns, datasetType);
      if (temporal === null) {
        return true;
      }

      if (temporal.marker !== undefined) {
        increment(markerFreq, temporal.marker);
        temporalRecordCount++;
      }

      if (temporal.year !== undefined) {
        increment(yearFreq, temporal.year);
        minYear = pickMin(minYear, temporal.year, compareNumbers);
        maxYear = pickMax(maxYear, temporal.year, compareNumbers);
      }

      if (temporal.date !== undefined) {
        minDate = pickMin(minDate, temporal.date, compareDates);
        maxDate = pickMax(maxDate, temporal.date, compareDates);
      }

      return true;
    },

    toStats(): Stats {
      return {
        tripleCount,
        subjects: new Set(subjects),
        objects: new Set(objects),
        relations: new Set(relations),
        subjectFreq: new Map(subjectFreq),
        objectFreq: new Map(objectFreq),
        entityFreq: new Map(entityFreq),
        relationFreq: new Map(relationFreq),
        yearFreq: new Map(yearFreq),
        markerFreq: new Map(markerFreq),
        temporalRecordCount,
        minDate,
        maxDate,
        minYear,
        maxYear,
      };
    },
  };
};

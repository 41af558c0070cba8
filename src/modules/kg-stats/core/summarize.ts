import { formatIsoDate } from './calendar-date.js';

import type { RankedEntry, Stats, Summary } from './types.js';

/**
 * The `topN` most frequent keys, highest count first. Equal counts keep the
 * map's insertion order (Array.prototype.sort is stable).
 */
export const rankTop = <K>(freq: ReadonlyMap<K, number>, topN: number): RankedEntry<K>[] => {
  if (topN <= 0) {
    return [];
  }

  return Array.from(freq, ([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, topN);
};

/**
 * Derives the read-only report of a Stats value.
 */
export const summarizeStats = (stats: Stats, topN: number): Summary => ({
  tripleCount: stats.tripleCount,
  uniqueSubjects: stats.subjects.size,
  uniqueObjects: stats.objects.size,
  uniqueRelations: stats.relations.size,
  topEntities: rankTop(stats.entityFreq, topN),
  topSubjects: rankTop(stats.subjectFreq, topN),
  topObjects: rankTop(stats.objectFreq, topN),
  topRelations: rankTop(stats.relationFreq, topN),
  topYears: rankTop(stats.yearFreq, topN),
  topMarkers: rankTop(stats.markerFreq, topN),
  temporalRecordCount: stats.temporalRecordCount,
  minDate: stats.minDate !== null ? formatIsoDate(stats.minDate) : null,
  maxDate: stats.maxDate !== null ? formatIsoDate(stats.maxDate) : null,
  minYear: stats.minYear,
  maxYear: stats.maxYear,
});

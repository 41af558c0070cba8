import { compareDates } from './calendar-date.js';
import { compareNumbers, pickMax, pickMin } from './extrema.js';

import type { Stats } from './types.js';

/**
 * The identity of `mergeStats`.
 */
export const emptyStats = (): Stats => ({
  tripleCount: 0,
  subjects: new Set(),
  objects: new Set(),
  relations: new Set(),
  subjectFreq: new Map(),
  objectFreq: new Map(),
  entityFreq: new Map(),
  relationFreq: new Map(),
  yearFreq: new Map(),
  markerFreq: new Map(),
  temporalRecordCount: 0,
  minDate: null,
  maxDate: null,
  minYear: null,
  maxYear: null,
});

const unionSets = <T>(a: ReadonlySet<T>, b: ReadonlySet<T>): Set<T> => {
  const result = new Set(a);
  for (const value of b) {
    result.add(value);
  }
  return result;
};

/**
 * Key-wise sum. Keys of `a` keep their order; keys only in `b` follow in
 * `b`'s order.
 */
const sumFrequencies = <K>(a: ReadonlyMap<K, number>, b: ReadonlyMap<K, number>): Map<K, number> => {
  const result = new Map(a);
  for (const [key, count] of b) {
    result.set(key, (result.get(key) ?? 0) + count);
  }
  return result;
};

/**
 * Combines two Stats values into a new one. Neither input is touched.
 *
 * Counts, set unions and frequency sums are commutative and associative, and
 * so are the extrema: each bound is folded on its own with `pickMin` /
 * `pickMax`, which adopt the other side whenever one side is absent.
 */
export const mergeStats = (a: Stats, b: Stats): Stats => ({
  tripleCount: a.tripleCount + b.tripleCount,
  subjects: unionSets(a.subjects, b.subjects),
  objects: unionSets(a.objects, b.objects),
  relations: unionSets(a.relations, b.relations),
  subjectFreq: sumFrequencies(a.subjectFreq, b.subjectFreq),
  objectFreq: sumFrequencies(a.objectFreq, b.objectFreq),
  entityFreq: sumFrequencies(a.entityFreq, b.entityFreq),
  relationFreq: sumFrequencies(a.relationFreq, b.relationFreq),
  yearFreq: sumFrequencies(a.yearFreq, b.yearFreq),
  markerFreq: sumFrequencies(a.markerFreq, b.markerFreq),
  temporalRecordCount: a.temporalRecordCount + b.temporalRecordCount,
  minDate: pickMin(a.minDate, b.minDate, compareDates),
  maxDate: pickMax(a.maxDate, b.maxDate, compareDates),
  minYear: pickMin(a.minYear, b.minYear, compareNumbers),
  maxYear: pickMax(a.maxYear, b.maxYear, compareNumbers),
});

/**
 * Left fold of `mergeStats` starting from `emptyStats()`.
 */
export const mergeAllStats = (values: Iterable<Stats>): Stats => {
  let aggregate = emptyStats();
  for (const value of values) {
    aggregate = mergeStats(aggregate, value);
  }
  return aggregate;
};

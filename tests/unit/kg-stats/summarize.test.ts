import { describe, expect, it } from 'vitest';

import {
  createStatsAccumulator,
  emptyStats,
  rankTop,
  summarizeStats,
} from '@/modules/kg-stats/index.js';

describe('rankTop', () => {
  const freq = new Map([
    ['x', 2],
    ['y', 5],
    ['z', 2],
    ['w', 7],
  ]);

  it('orders by count and keeps insertion order among ties', () => {
    expect(rankTop(freq, 10)).toEqual([
      { key: 'w', count: 7 },
      { key: 'y', count: 5 },
      { key: 'x', count: 2 },
      { key: 'z', count: 2 },
    ]);
  });

  it('truncates to topN', () => {
    expect(rankTop(freq, 2).map((entry) => entry.key)).toEqual(['w', 'y']);
  });

  it('returns nothing for a non-positive topN', () => {
    expect(rankTop(freq, 0)).toEqual([]);
    expect(rankTop(freq, -3)).toEqual([]);
  });

  it('leaves the map untouched', () => {
    rankTop(freq, 1);
    expect([...freq.keys()]).toEqual(['x', 'y', 'z', 'w']);
  });
});

describe('summarizeStats', () => {
  it('derives counts, rankings and ISO date bounds', () => {
    const accumulator = createStatsAccumulator('event-calendar');
    accumulator.addLine('Iran\tMake statement\tIraq\t2014-01-02');
    accumulator.addLine('Iraq\tConsult\tIran\t2014-03-04');
    accumulator.addLine('Iran\tMake statement\tChina\t2013-08-09');

    const summary = summarizeStats(accumulator.toStats(), 2);

    expect(summary).toEqual({
      tripleCount: 3,
      uniqueSubjects: 2,
      uniqueObjects: 3,
      uniqueRelations: 2,
      topEntities: [
        { key: 'Iran', count: 3 },
        { key: 'Iraq', count: 2 },
      ],
      topSubjects: [
        { key: 'Iran', count: 2 },
        { key: 'Iraq', count: 1 },
      ],
      topObjects: [
        { key: 'Iraq', count: 1 },
        { key: 'Iran', count: 1 },
      ],
      topRelations: [
        { key: 'Make statement', count: 2 },
        { key: 'Consult', count: 1 },
      ],
      topYears: [
        { key: 2014, count: 2 },
        { key: 2013, count: 1 },
      ],
      topMarkers: [],
      temporalRecordCount: 0,
      minDate: '2013-08-09',
      maxDate: '2014-03-04',
      minYear: 2013,
      maxYear: 2014,
    });
  });

  it('reports absent bounds as null', () => {
    const summary = summarizeStats(emptyStats(), 5);

    expect(summary.tripleCount).toBe(0);
    expect(summary.topEntities).toEqual([]);
    expect(summary.minDate).toBeNull();
    expect(summary.maxDate).toBeNull();
    expect(summary.minYear).toBeNull();
    expect(summary.maxYear).toBeNull();
  });

  it('lists fields in report order', () => {
    expect(Object.keys(summarizeStats(emptyStats(), 1))).toEqual([
      'tripleCount',
      'uniqueSubjects',
      'uniqueObjects',
      'uniqueRelations',
      'topEntities',
      'topSubjects',
      'topObjects',
      'topRelations',
      'topYears',
      'topMarkers',
      'temporalRecordCount',
      'minDate',
      'maxDate',
      'minYear',
      'maxYear',
    ]);
  });
});

import { describe, expect, it } from 'vitest';

import { classifyDataset } from '@/modules/kg-stats/index.js';

describe('classifyDataset', () => {
  it('recognizes the known naming conventions', () => {
    expect(classifyDataset('icews14')).toBe('event-calendar');
    expect(classifyDataset('ICEWS05-15')).toBe('event-calendar');
    expect(classifyDataset('wikidata')).toBe('linked-data');
    expect(classifyDataset('yago11k')).toBe('fact-extraction');
    expect(classifyDataset('YAGO15k')).toBe('fact-extraction');
  });

  it('falls back to generic for anything else', () => {
    expect(classifyDataset('gdelt')).toBe('generic');
    expect(classifyDataset('')).toBe('generic');
  });

  it('checks the fragments in a fixed order', () => {
    expect(classifyDataset('icews-wikidata-yago')).toBe('event-calendar');
    expect(classifyDataset('yago-wikidata')).toBe('linked-data');
  });
});

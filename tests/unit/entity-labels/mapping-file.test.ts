import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  formatLabelMapping,
  parseLabelMapping,
  readLabelMapping,
  writeLabelMapping,
} from '@/modules/entity-labels/index.js';

const makeTempDir = async (): Promise<string> => mkdtemp(path.join(tmpdir(), 'kg-labels-'));

describe('parseLabelMapping', () => {
  it('reads id and label columns, trimming both', () => {
    const mapping = parseLabelMapping('Q1\tEarth\n Q2 \t Moon \n\nQ3\n', '\t');

    expect([...mapping]).toEqual([
      ['Q1', 'Earth'],
      ['Q2', 'Moon'],
      ['Q3', ''],
    ]);
  });

  it('keeps quote characters as data', () => {
    const mapping = parseLabelMapping('Q1\t"Earth" (planet)\n', '\t');

    expect(mapping.get('Q1')).toBe('"Earth" (planet)');
  });

  it('uses the given delimiter and ignores extra columns', () => {
    const mapping = parseLabelMapping('Q1,Earth,extra\n,orphan\n', ',');

    expect([...mapping]).toEqual([['Q1', 'Earth']]);
  });
});

describe('label mapping files', () => {
  it('writes id-label lines and reads them back', async () => {
    const dir = await makeTempDir();
    const mappingPath = path.join(dir, 'data', 'labels.tsv');
    const mapping = new Map([
      ['Q1', 'Earth'],
      ['Q2', ''],
    ]);

    const writeResult = await writeLabelMapping(mappingPath, mapping);

    expect(writeResult.isOk()).toBe(true);
    expect(await readFile(mappingPath, 'utf8')).toBe('Q1\tEarth\nQ2\t\n');
    expect([...(await readLabelMapping(mappingPath, '\t'))._unsafeUnwrap()]).toEqual([
      ['Q1', 'Earth'],
      ['Q2', ''],
    ]);
  });

  it('formats nothing for an empty mapping', () => {
    expect(formatLabelMapping(new Map())).toBe('');
  });

  it('fails with EmptyMapping for a file without entries', async () => {
    const dir = await makeTempDir();
    const mappingPath = path.join(dir, 'labels.tsv');
    await writeFile(mappingPath, '\n\n', 'utf8');

    const result = await readLabelMapping(mappingPath, '\t');

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'EmptyMapping',
      message: `No entries found in mapping file ${mappingPath}.`,
      path: mappingPath,
    });
  });

  it('fails with ReadError for a missing file', async () => {
    const dir = await makeTempDir();

    const result = await readLabelMapping(path.join(dir, 'missing.tsv'), '\t');

    expect(result._unsafeUnwrapErr().type).toBe('ReadError');
  });
});

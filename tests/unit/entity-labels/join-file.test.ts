import { mkdir, mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { defaultLabeledPath, joinLabelsIntoFile } from '@/modules/entity-labels/index.js';

const mapping = new Map([
  ['Q1', 'Earth'],
  ['Q2', 'Moon'],
]);

const writeSplit = async (contents: string): Promise<string> => {
  const dir = await mkdtemp(path.join(tmpdir(), 'kg-join-'));
  const datasetPath = path.join(dir, 'wiki_train.txt');
  await writeFile(datasetPath, contents, 'utf8');
  return datasetPath;
};

describe('joinLabelsIntoFile', () => {
  it('writes labeled rows next to the split by default', async () => {
    const datasetPath = await writeSplit(
      'Q1\tP1\tQ2\toccursSince\t1990\nQ2\tP1\tQ3\toccursUntil\t\n\nshort\trow\n'
    );

    const result = await joinLabelsIntoFile({
      datasetPath,
      mapping,
      delimiter: '\t',
      missingValue: 'UNKNOWN',
    });

    expect(result._unsafeUnwrap()).toEqual({
      outputPath: `${datasetPath}.labeled`,
      rowsWritten: 3,
      rowsLabeled: 2,
    });
    expect(await readFile(defaultLabeledPath(datasetPath), 'utf8')).toBe(
      [
        'Q1\tP1\tQ2\tEarth\tMoon\toccursSince\t1990',
        'Q2\tP1\tQ3\tMoon\tUNKNOWN\toccursUntil\t',
        'short\trow',
        '',
      ].join('\n')
    );
  });

  it('writes to an explicit output path with the given delimiter', async () => {
    const datasetPath = await writeSplit('Q1,P1,Q2\n');
    const outputPath = path.join(path.dirname(datasetPath), 'out', 'labeled.csv');

    const result = await joinLabelsIntoFile({
      datasetPath,
      outputPath,
      mapping,
      delimiter: ',',
      missingValue: '',
    });

    expect(result._unsafeUnwrap().outputPath).toBe(outputPath);
    expect(await readFile(outputPath, 'utf8')).toBe('Q1,P1,Q2,Earth,Moon\n');
  });

  it('names the dataset when it is a directory', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'kg-join-'));
    const datasetPath = path.join(dir, 'wiki_train.txt');
    await mkdir(datasetPath);

    const result = await joinLabelsIntoFile({
      datasetPath,
      outputPath: path.join(dir, 'out.txt'),
      mapping,
      delimiter: '\t',
      missingValue: '',
    });

    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'ReadError', path: datasetPath });
  });

  it('fails with ReadError for a missing split', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'kg-join-'));

    const result = await joinLabelsIntoFile({
      datasetPath: path.join(dir, 'missing.txt'),
      mapping,
      delimiter: '\t',
      missingValue: '',
    });

    expect(result._unsafeUnwrapErr().type).toBe('ReadError');
  });
});

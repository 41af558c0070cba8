import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { readFileLines } from '@/modules/kg-stats/shell/repo/line-reader.js';

const writeTempFile = async (contents: string): Promise<string> => {
  const dir = await mkdtemp(path.join(tmpdir(), 'kg-lines-'));
  const filePath = path.join(dir, 'split.txt');
  await writeFile(filePath, contents, 'utf8');
  return filePath;
};

describe('readFileLines', () => {
  it('hands every line to the callback without newlines', async () => {
    const filePath = await writeTempFile('a\tr\tb\r\nc\tr\td\n\ne\tr\tf');
    const lines: string[] = [];

    const result = await readFileLines(filePath, (line) => lines.push(line));

    expect(result._unsafeUnwrap()).toBe(4);
    expect(lines).toEqual(['a\tr\tb', 'c\tr\td', '', 'e\tr\tf']);
  });

  it('reads an empty file as zero lines', async () => {
    const filePath = await writeTempFile('');

    const result = await readFileLines(filePath, () => undefined);

    expect(result._unsafeUnwrap()).toBe(0);
  });

  it('returns a ReadError for a missing file', async () => {
    const filePath = path.join(tmpdir(), 'kg-lines-missing', 'nope.txt');

    const result = await readFileLines(filePath, () => undefined);

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'ReadError', path: filePath });
  });
});

import fs from 'node:fs/promises';
import { createInterface } from 'node:readline';

import { err, ok, type Result } from 'neverthrow';

import { createReadError, type ReadError } from '../../core/errors.js';

import type { LineReader } from '../../core/ports.js';
import type { FileHandle } from 'node:fs/promises';

/**
 * Streams a UTF-8 file line by line; only the current line is held in memory.
 * The file handle is released on completion and on failure.
 */
export const readFileLines: LineReader = async (
  filePath: string,
  onLine: (line: string) => void
): Promise<Result<number, ReadError>> => {
  let handle: FileHandle;
  try {
    handle = await fs.open(filePath, 'r');
  } catch (error) {
    return err(createReadError(filePath, error));
  }

  const input = handle.createReadStream({ encoding: 'utf8', autoClose: false });
  const lines = createInterface({ input, crlfDelay: Infinity });
  let count = 0;

  try {
    for await (const line of lines) {
      onLine(line);
      count++;
    }
  } catch (error) {
    return err(createReadError(filePath, error));
  } finally {
    lines.close();
    input.destroy();
    await handle.close();
  }

  return ok(count);
};

import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { createReadError, type ReadError } from '../../core/errors.js';

import type { DatasetCatalog } from '../../core/ports.js';
import type { DatasetEntry, SplitFileEntry } from '../../core/types.js';
import type { Dirent, Stats } from 'node:fs';

export interface FsDatasetCatalogOptions {
  baseDir: string;
  /** Split file extension, including the dot */
  splitExtension?: string;
}

const DEFAULT_SPLIT_EXTENSION = '.txt';

/**
 * Code-point order, independent of the process locale.
 */
const compareNames = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

const isMissingDirectory = (error: unknown): boolean => {
  const code = (error as NodeJS.ErrnoException).code;
  return code === 'ENOENT' || code === 'ENOTDIR';
};

const isDanglingLink = (error: unknown): boolean =>
  isMissingDirectory(error) || (error as NodeJS.ErrnoException).code === 'ELOOP';

/**
 * Resolves symlinks so linked dataset folders and splits are picked up too.
 * A dangling link is neither.
 */
const resolveKind = async (
  dir: string,
  entry: Dirent
): Promise<'directory' | 'file' | 'other'> => {
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  if (!entry.isSymbolicLink()) return 'other';

  let target: Stats;
  try {
    target = await fs.stat(path.join(dir, entry.name));
  } catch (error) {
    if (isDanglingLink(error)) return 'other';
    throw error;
  }
  if (target.isDirectory()) return 'directory';
  if (target.isFile()) return 'file';
  return 'other';
};

const listEntries = async (
  dir: string,
  kind: 'directory' | 'file',
  accept: (name: string) => boolean
): Promise<{ name: string; absolutePath: string }[]> => {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const matches: { name: string; absolutePath: string }[] = [];

  for (const entry of entries) {
    if (!accept(entry.name)) continue;
    if ((await resolveKind(dir, entry)) !== kind) continue;
    matches.push({ name: entry.name, absolutePath: path.join(dir, entry.name) });
  }

  return matches.sort((a, b) => compareNames(a.name, b.name));
};

export const createFsDatasetCatalog = (options: FsDatasetCatalogOptions): DatasetCatalog => {
  const baseDir = path.resolve(options.baseDir);
  const splitExtension = options.splitExtension ?? DEFAULT_SPLIT_EXTENSION;

  return {
    baseDir: options.baseDir,

    async listDatasets(): Promise<Result<DatasetEntry[], ReadError>> {
      try {
        return ok(await listEntries(baseDir, 'directory', () => true));
      } catch (error) {
        if (isMissingDirectory(error)) {
          return ok([]);
        }
        return err(createReadError(baseDir, error));
      }
    },

    async listSplitFiles(dataset: DatasetEntry): Promise<Result<SplitFileEntry[], ReadError>> {
      try {
        return ok(
          await listEntries(dataset.absolutePath, 'file', (name) => name.endsWith(splitExtension))
        );
      } catch (error) {
        return err(createReadError(dataset.absolutePath, error));
      }
    },
  };
};

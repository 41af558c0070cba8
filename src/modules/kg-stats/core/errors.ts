/**
 * KG Stats Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 * Per-line parse problems are not errors: they only drop the line's
 * temporal contribution (or the line itself, under three columns).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The base directory has no dataset folder matching the selection.
 */
export interface NoDatasetsFoundError {
  readonly type: 'NoDatasetsFound';
  readonly message: string;
  readonly baseDir: string;
  readonly include: readonly string[];
}

/**
 * A tool that requires the base directory up front could not find it.
 */
export interface BaseDirNotFoundError {
  readonly type: 'BaseDirNotFound';
  readonly message: string;
  readonly path: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// I/O Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface ReadError {
  readonly type: 'ReadError';
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}

export interface WriteError {
  readonly type: 'WriteError';
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}

export type KgStatsError = NoDatasetsFoundError | BaseDirNotFoundError | ReadError | WriteError;

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createNoDatasetsFoundError = (
  baseDir: string,
  include: readonly string[]
): NoDatasetsFoundError => ({
  type: 'NoDatasetsFound',
  message:
    include.length > 0
      ? `No dataset folders matching ${include.join(', ')} found under ${baseDir}.`
      : `No dataset folders found under ${baseDir}.`,
  baseDir,
  include,
});

export const createBaseDirNotFoundError = (path: string): BaseDirNotFoundError => ({
  type: 'BaseDirNotFound',
  message: `Base directory ${path} does not exist.`,
  path,
});

const causeMessage = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

export const createReadError = (path: string, cause: unknown): ReadError => ({
  type: 'ReadError',
  message: `Failed to read ${path}: ${causeMessage(cause)}`,
  path,
  cause,
});

export const createWriteError = (path: string, cause: unknown): WriteError => ({
  type: 'WriteError',
  message: `Failed to write ${path}: ${causeMessage(cause)}`,
  path,
  cause,
});

import { Type } from '@sinclair/typebox';
import { describe, expect, it } from 'vitest';

import {
  parseCliOptions,
  tokenizeArgs,
  validateOptions,
  type OptionTable,
} from '@/infra/cli/args.js';

const table: OptionTable = {
  'base-dir': 'value',
  datasets: 'list',
  'top-n': 'value',
  'per-file': 'flag',
};

const schema = Type.Object({
  baseDir: Type.String({ default: 'TemporalKGs' }),
  datasets: Type.Optional(Type.Array(Type.String())),
  topN: Type.Integer({ minimum: 0, default: 5 }),
  perFile: Type.Boolean({ default: false }),
});

describe('tokenizeArgs', () => {
  it('maps dashed names to camelCase keys', () => {
    expect(
      tokenizeArgs(['--base-dir', 'kg', '--top-n=3', '--per-file'], table)._unsafeUnwrap()
    ).toEqual({ baseDir: 'kg', topN: '3', perFile: true });
  });

  it('collects list values up to the next option', () => {
    expect(
      tokenizeArgs(['--datasets', 'icews14', 'yago11k', '--top-n', '1'], table)._unsafeUnwrap()
    ).toEqual({ datasets: ['icews14', 'yago11k'], topN: '1' });
  });

  it('accepts an empty list', () => {
    expect(tokenizeArgs(['--datasets'], table)._unsafeUnwrap()).toEqual({ datasets: [] });
  });

  it('rejects unknown options, stray arguments and missing values', () => {
    expect(tokenizeArgs(['--verbose'], table)._unsafeUnwrapErr().message).toBe(
      "Unknown option '--verbose'"
    );
    expect(tokenizeArgs(['icews14'], table)._unsafeUnwrapErr().message).toBe(
      "Unexpected argument 'icews14'"
    );
    expect(tokenizeArgs(['--top-n'], table)._unsafeUnwrapErr().message).toBe(
      "Option '--top-n' requires a value"
    );
    expect(tokenizeArgs(['--per-file=yes'], table)._unsafeUnwrapErr().message).toBe(
      "Option '--per-file' does not take a value"
    );
  });
});

describe('validateOptions', () => {
  it('applies defaults and converts numbers', () => {
    expect(validateOptions(schema, { topN: '3' })._unsafeUnwrap()).toEqual({
      baseDir: 'TemporalKGs',
      topN: 3,
      perFile: false,
    });
  });

  it('reports schema violations as details', () => {
    const error = validateOptions(schema, { topN: 'many' })._unsafeUnwrapErr();

    expect(error.type).toBe('InvalidOptions');
    expect(error.message).toBe('Invalid command-line options');
    expect(error.details.some((detail) => detail.startsWith('/topN: '))).toBe(true);
  });

  it('rejects values below the minimum', () => {
    expect(validateOptions(schema, { topN: '-1' }).isErr()).toBe(true);
  });
});

describe('parseCliOptions', () => {
  it('tokenizes and validates in one step', () => {
    expect(parseCliOptions(['--datasets', 'wikidata'], table, schema)._unsafeUnwrap()).toEqual({
      baseDir: 'TemporalKGs',
      datasets: ['wikidata'],
      topN: 5,
      perFile: false,
    });
  });
});

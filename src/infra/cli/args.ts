/**
 * Command-line option parsing
 *
 * argv is first tokenized against a small per-tool option table, then the raw
 * values are coerced and validated with the tool's TypeBox schema.
 */

import { type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidOptionsError,
  type InvalidOptionsError,
} from '../../common/types/errors.js';

/**
 * How an option consumes argv tokens:
 * - value: exactly one following token
 * - list: every following token up to the next option
 * - flag: no token, presence means true
 */
export type OptionKind = 'value' | 'list' | 'flag';

export type OptionTable = Readonly<Record<string, OptionKind>>;

export type RawOptions = Record<string, string | string[] | boolean>;

const toCamelCase = (name: string): string =>
  name.replace(/-([a-z])/g, (_match, letter: string) => letter.toUpperCase());

/**
 * Splits argv into raw option values keyed by camelCase name.
 * `--top-n 3` becomes `{ topN: '3' }`; `--top-n=3` is accepted as well.
 */
export const tokenizeArgs = (
  argv: readonly string[],
  table: OptionTable
): Result<RawOptions, InvalidOptionsError> => {
  const options: RawOptions = {};

  for (let index = 0; index < argv.length; index++) {
    const token = argv[index] ?? '';

    if (!token.startsWith('--')) {
      return err(createInvalidOptionsError(`Unexpected argument '${token}'`));
    }

    const [rawName = '', inlineValue] = token.slice(2).split(/=(.*)/s, 2);
    const kind = table[rawName];
    if (kind === undefined) {
      return err(createInvalidOptionsError(`Unknown option '--${rawName}'`));
    }

    const key = toCamelCase(rawName);

    if (kind === 'flag') {
      if (inlineValue !== undefined) {
        return err(createInvalidOptionsError(`Option '--${rawName}' does not take a value`));
      }
      options[key] = true;
      continue;
    }

    if (kind === 'value') {
      if (inlineValue !== undefined) {
        options[key] = inlineValue;
        continue;
      }
      const next = argv[index + 1];
      if (next === undefined || next.startsWith('--')) {
        return err(createInvalidOptionsError(`Option '--${rawName}' requires a value`));
      }
      options[key] = next;
      index++;
      continue;
    }

    const values: string[] = inlineValue !== undefined ? [inlineValue] : [];
    while (index + 1 < argv.length && !(argv[index + 1] ?? '').startsWith('--')) {
      values.push(argv[index + 1] ?? '');
      index++;
    }
    const previous = options[key];
    options[key] = Array.isArray(previous) ? [...previous, ...values] : values;
  }

  return ok(options);
};

/**
 * Applies schema defaults, coerces string values (numbers, integers) and
 * validates the result.
 */
export const validateOptions = <T extends TSchema>(
  schema: T,
  raw: RawOptions
): Result<Static<T>, InvalidOptionsError> => {
  const withDefaults = Value.Default(schema, Value.Clone(raw));
  const converted = Value.Convert(schema, withDefaults);

  if (!Value.Check(schema, converted)) {
    const details = [...Value.Errors(schema, converted)].map(
      (error) => `${error.path}: ${error.message}`
    );
    return err(createInvalidOptionsError('Invalid command-line options', details));
  }

  return ok(converted);
};

/**
 * Tokenizes and validates argv in one step.
 */
export const parseCliOptions = <T extends TSchema>(
  argv: readonly string[],
  table: OptionTable,
  schema: T
): Result<Static<T>, InvalidOptionsError> =>
  tokenizeArgs(argv, table).andThen((raw) => validateOptions(schema, raw));

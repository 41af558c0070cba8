/**
 * Command runtime
 * Builds config and logger once and turns command errors into exit codes
 */

import { errorMessage, formatAppError, type AppError } from '../common/types/errors.js';
import { createConfig, parseEnv, type AppConfig } from '../infra/config/env.js';
import { createLogger, type Logger } from '../infra/logger/index.js';

import type { Result } from 'neverthrow';

export interface CommandRuntime {
  config: AppConfig;
  logger: Logger;
  /** Writes one chunk of report output (stdout in scripts) */
  print: (text: string) => void;
}

export type Command = (
  argv: readonly string[],
  runtime: CommandRuntime
) => Promise<Result<void, AppError & { details?: readonly string[] }>>;

export const createCommandRuntime = (env: NodeJS.ProcessEnv = process.env): CommandRuntime => {
  const config = createConfig(parseEnv(env));
  const logger = createLogger({ level: config.logger.level, pretty: config.logger.pretty });

  return {
    config,
    logger,
    print: (text) => {
      console.log(text);
    },
  };
};

/**
 * Runs a command against `process.argv`. Fatal errors print a message on
 * stderr and exit with status 1.
 */
export const runCommand = async (command: Command): Promise<void> => {
  try {
    const runtime = createCommandRuntime();
    const result = await command(process.argv.slice(2), runtime);

    if (result.isErr()) {
      console.error(formatAppError(result.error));
      process.exit(1);
    }
  } catch (error) {
    console.error(errorMessage(error));
    process.exit(1);
  }
};

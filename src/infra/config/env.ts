/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Datasets
  KG_BASE_DIR: Type.String({ minLength: 1, default: 'TemporalKGs' }),

  // Label lookup
  WIKIDATA_API_URL: Type.String({
    minLength: 1,
    default: 'https://www.wikidata.org/w/api.php',
  }),
});

export type Env = Static<typeof EnvSchema>;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    KG_BASE_DIR: env['KG_BASE_DIR'] ?? 'TemporalKGs',
    WIKIDATA_API_URL: env['WIKIDATA_API_URL'] ?? 'https://www.wikidata.org/w/api.php',
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  datasets: {
    /** Folder holding one subdirectory per dataset */
    baseDir: env.KG_BASE_DIR,
    splitExtension: '.txt',
  },
  labels: {
    apiUrl: env.WIKIDATA_API_URL,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;

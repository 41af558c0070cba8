/**
 * Wikidata label lookup over the `wbgetentities` action API.
 */

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { createLabelFetchError, type LabelFetchError } from '../core/errors.js';

import type { LabelLookup } from '../core/ports.js';

const LabelSchema = Type.Object({ value: Type.String() });

const WbGetEntitiesResponseSchema = Type.Object({
  entities: Type.Optional(
    Type.Record(
      Type.String(),
      Type.Object({
        labels: Type.Optional(Type.Record(Type.String(), LabelSchema)),
      })
    )
  ),
});

const validator = TypeCompiler.Compile(WbGetEntitiesResponseSchema);

const DEFAULT_USER_AGENT = 'temporal-kg-stats/0.1 (label mapping builder)';
const REQUEST_TIMEOUT_MS = 30_000;

export interface WikidataLabelLookupOptions {
  apiUrl: string;
  userAgent?: string;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

export const buildLabelsUrl = (apiUrl: string, ids: readonly string[], language: string): string => {
  const url = new URL(apiUrl);
  url.search = new URLSearchParams({
    action: 'wbgetentities',
    format: 'json',
    ids: ids.join('|'),
    props: 'labels',
    languages: language,
  }).toString();
  return url.toString();
};

export const createWikidataLabelLookup = (options: WikidataLabelLookupOptions): LabelLookup => {
  const fetchFn = options.fetchFn ?? fetch;

  return {
    async fetchLabels(
      ids: readonly string[],
      language: string
    ): Promise<Result<Map<string, string>, LabelFetchError>> {
      const url = buildLabelsUrl(options.apiUrl, ids, language);

      let payload: unknown;
      try {
        const response = await fetchFn(url, {
          headers: { 'user-agent': options.userAgent ?? DEFAULT_USER_AGENT },
          signal: AbortSignal.timeout(options.timeoutMs ?? REQUEST_TIMEOUT_MS),
        });

        if (!response.ok) {
          return err(
            createLabelFetchError(
              `Label request failed with status ${String(response.status)}`,
              response.status
            )
          );
        }

        payload = await response.json();
      } catch (error) {
        return err(
          createLabelFetchError(
            `Label request failed: ${error instanceof Error ? error.message : String(error)}`,
            undefined,
            error
          )
        );
      }

      if (!validator.Check(payload)) {
        const details = [...validator.Errors(payload)].map((e) => `${e.path}: ${e.message}`);
        return err(createLabelFetchError(`Unexpected label response: ${details.join(', ')}`));
      }

      const labels = new Map<string, string>();
      for (const [entityId, entity] of Object.entries(payload.entities ?? {})) {
        labels.set(entityId, entity.labels?.[language]?.value ?? '');
      }

      return ok(labels);
    },
  };
};

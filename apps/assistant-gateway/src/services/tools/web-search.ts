import { makeCacheKey, type TtlCache } from '@session-governor/core';
import { z } from 'zod';

import { createGovernedTool, type GovernedTool, type ToolGovernance } from './governed-tool';
import type { HttpClient } from './http-client';

const CUSTOM_SEARCH_URL = 'https://www.googleapis.com/customsearch/v1';
const RESULT_COUNT = 3;
const SNIPPET_LIMIT = 400;

export const SEARCH_UNAVAILABLE_MESSAGE = 'Web search is temporarily unavailable.';

/** Restricts results to a period: `d1` past day, `w1` past week, `m1` past month. */
export type SearchTimeFrame = '' | 'd1' | 'w1' | 'm1';

export interface WebSearchCredentials {
  googleApiKey?: string;
  googleSearchEngineId?: string;
}

const searchResponseSchema = z.object({
  items: z
    .array(
      z
        .object({
          title: z.string().optional(),
          snippet: z.string().optional(),
          link: z.string().optional(),
        })
        .passthrough(),
    )
    .optional(),
});

export function buildSearchUrl(
  credentials: Required<WebSearchCredentials>,
  query: string,
  timeFrame: SearchTimeFrame,
): string {
  const params = new URLSearchParams({
    key: credentials.googleApiKey,
    cx: credentials.googleSearchEngineId,
    q: query,
    num: String(RESULT_COUNT),
  });

  if (timeFrame) {
    params.set('dateRestrict', timeFrame);
    params.set('sort', 'date');
  }

  return `${CUSTOM_SEARCH_URL}?${params.toString()}`;
}

export function createWebSearchTool(
  governance: ToolGovernance,
  cache: TtlCache<string>,
  httpClient: HttpClient,
  credentials: WebSearchCredentials,
): GovernedTool<[query: string, timeFrame?: SearchTimeFrame]> {
  return createGovernedTool<[query: string, timeFrame?: SearchTimeFrame]>(governance, {
    name: 'web_search',
    cache,
    failureMessage: 'Could not complete the web search.',
    cacheKey: (query, timeFrame = '') => makeCacheKey([query, timeFrame]),
    async execute(query, timeFrame = '') {
      const { googleApiKey, googleSearchEngineId } = credentials;
      if (!googleApiKey || !googleSearchEngineId) {
        governance.logger.error('Web search is missing GOOGLE_API_KEY or GOOGLE_CSE_ID');
        return { ok: false, text: SEARCH_UNAVAILABLE_MESSAGE };
      }

      const response = await httpClient(
        buildSearchUrl({ googleApiKey, googleSearchEngineId }, query, timeFrame),
        { timeoutMs: 8000 },
      );

      if (!response.ok) {
        governance.logger.error({ status: response.status }, 'Search API error');
        return { ok: false, text: 'The search service returned an error.' };
      }

      const { items = [] } = searchResponseSchema.parse(await response.json());
      if (items.length === 0) {
        return { ok: false, text: `Nothing found for '${query}'.` };
      }

      const body = items
        .slice(0, RESULT_COUNT)
        .map((item, index) =>
          [
            `${index + 1}. ${item.title ?? 'Untitled'}`,
            `   Snippet: ${(item.snippet ?? '').slice(0, SNIPPET_LIMIT)}`,
            `   Link: ${item.link ?? ''}`,
          ].join('\n'),
        )
        .join('\n\n');

      return {
        ok: true,
        text: `SEARCH SUCCESS. Results for '${query}':\n\nRESULTS:\n${body}`,
      };
    },
  });
}

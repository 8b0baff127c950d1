import { makeCacheKey, type TtlCache } from '@session-governor/core';
import { z } from 'zod';

import { createGovernedTool, type GovernedTool, type ToolGovernance } from './governed-tool';
import type { HttpClient } from './http-client';

const WEATHER_BASE_URL = 'https://wttr.in';

const citySchema = z
  .string()
  .transform((value) => value.trim().replace(/\s+/g, ' '))
  .pipe(
    z
      .string()
      .min(2, 'City name is too short')
      .max(100, 'City name is too long'),
  );

export function createWeatherTool(
  governance: ToolGovernance,
  cache: TtlCache<string>,
  httpClient: HttpClient,
): GovernedTool<[city: string]> {
  return createGovernedTool<[city: string]>(governance, {
    name: 'weather',
    cache,
    failureMessage: 'Could not get the weather.',
    silent: true,
    cacheKey: (city) => makeCacheKey([city.trim().replace(/\s+/g, ' ').toLowerCase()]),
    async execute(rawCity) {
      const parsed = citySchema.safeParse(rawCity);
      if (!parsed.success) {
        return { ok: false, text: `City validation error: ${parsed.error.issues[0]?.message}` };
      }

      const city = parsed.data;
      const response = await httpClient(`${WEATHER_BASE_URL}/${encodeURIComponent(city)}?format=3`, {
        timeoutMs: 6000,
      });

      if (!response.ok) {
        governance.logger.error({ city, status: response.status }, 'Weather API error');
        return { ok: false, text: `Could not retrieve weather for ${city}.` };
      }

      const report = (await response.text()).trim();
      return {
        ok: true,
        text: [
          'WEATHER FOUND.',
          '',
          `[SYSTEM NOTE: The weather is already retrieved. Say: 'Weather in ${city}: ${report}']`,
          '',
          'DATA:',
          report,
        ].join('\n'),
      };
    },
  });
}

import { TtlCache, type TtlCacheStats } from '@session-governor/core';

import type { AppConfig } from '../../config';

import { createCryptoPriceTool } from './crypto-price';
import type { GovernedTool, ToolGovernance } from './governed-tool';
import { fetchHttpClient, type HttpClient } from './http-client';
import { createWeatherTool } from './weather';
import { createWebSearchTool, type SearchTimeFrame } from './web-search';

export { RATE_LIMITED_MESSAGE, createGovernedTool } from './governed-tool';
export type { GovernedTool, GovernedToolDefinition, ToolGovernance, ToolResult } from './governed-tool';
export type { HttpClient, HttpResponseLike } from './http-client';
export { fetchHttpClient } from './http-client';
export { normalizeSymbol, formatPrice } from './crypto-price';
export { SEARCH_UNAVAILABLE_MESSAGE, buildSearchUrl } from './web-search';
export type { SearchTimeFrame } from './web-search';

export type ToolCacheName = 'cryptoPrice' | 'weather' | 'webSearch';

/** One TTL cache per tool, sized from configuration. */
export type ToolCaches = Record<ToolCacheName, TtlCache<string>>;

export interface AssistantTools {
  caches: ToolCaches;
  getCryptoPrice: GovernedTool<[symbol: string]>;
  getWeather: GovernedTool<[city: string]>;
  searchWeb: GovernedTool<[query: string, timeFrame?: SearchTimeFrame]>;
}

export function createToolCaches(config: AppConfig, governance: ToolGovernance): ToolCaches {
  const build = (name: string, settings: AppConfig['cache'][ToolCacheName]): TtlCache<string> =>
    new TtlCache<string>({
      name,
      ttlSeconds: settings.ttlSeconds,
      maxSize: settings.maxSize,
      logger: governance.logger.child({ component: 'cache', cache: name }),
    });

  return {
    cryptoPrice: build('crypto_price', config.cache.cryptoPrice),
    weather: build('weather', config.cache.weather),
    webSearch: build('web_search', config.cache.webSearch),
  };
}

export function createAssistantTools(
  config: AppConfig,
  governance: ToolGovernance,
  httpClient: HttpClient = fetchHttpClient,
): AssistantTools {
  const caches = createToolCaches(config, governance);

  return {
    caches,
    getCryptoPrice: createCryptoPriceTool(governance, caches.cryptoPrice, httpClient),
    getWeather: createWeatherTool(governance, caches.weather, httpClient),
    searchWeb: createWebSearchTool(governance, caches.webSearch, httpClient, config.search),
  };
}

export function describeToolCaches(caches: ToolCaches): Record<ToolCacheName, TtlCacheStats> {
  return {
    cryptoPrice: caches.cryptoPrice.stats(),
    weather: caches.weather.stats(),
    webSearch: caches.webSearch.stats(),
  };
}

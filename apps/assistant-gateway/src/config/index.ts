export { loadConfig } from './env';
export type { AppConfig, CacheSettings, MemoryLoadFailurePolicy } from './env';

import { z } from 'zod';

/** Build a schema for an optional positive integer variable with a default. */
function positiveInt(name: string, fallback: number) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (!value) {
        return fallback;
      }
      const parsed = Number.parseInt(value, 10);
      if (Number.isNaN(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid ${name} value: ${value}` });
        return z.NEVER;
      }
      return parsed;
    });
}

function flag(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((value) => (value ? value.toLowerCase() : String(fallback)))
    .pipe(z.enum(['true', 'false', '1', '0']))
    .transform((value) => value === 'true' || value === '1');
}

/**
 * Zod schema describing the environment contract of the assistant gateway.
 * Every governance knob has a default so that a bare environment boots a
 * local development instance.
 */
const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default(process.env.NODE_ENV === 'production' ? 'production' : 'development'),
    PORT: positiveInt('PORT', 8080),
    LOG_LEVEL: z.string().optional(),
    ADMIN_API_TOKEN: z.string().min(1).optional(),
    CRYPTO_PRICE_CACHE_TTL_SECONDS: positiveInt('CRYPTO_PRICE_CACHE_TTL_SECONDS', 30),
    CRYPTO_PRICE_CACHE_MAX_SIZE: positiveInt('CRYPTO_PRICE_CACHE_MAX_SIZE', 100),
    WEATHER_CACHE_TTL_SECONDS: positiveInt('WEATHER_CACHE_TTL_SECONDS', 600),
    WEATHER_CACHE_MAX_SIZE: positiveInt('WEATHER_CACHE_MAX_SIZE', 100),
    WEB_SEARCH_CACHE_TTL_SECONDS: positiveInt('WEB_SEARCH_CACHE_TTL_SECONDS', 600),
    WEB_SEARCH_CACHE_MAX_SIZE: positiveInt('WEB_SEARCH_CACHE_MAX_SIZE', 50),
    RATE_LIMIT_MAX_REQUESTS: positiveInt('RATE_LIMIT_MAX_REQUESTS', 10),
    RATE_LIMIT_WINDOW_SECONDS: positiveInt('RATE_LIMIT_WINDOW_SECONDS', 60),
    RATE_LIMIT_BLOCK_SECONDS: positiveInt('RATE_LIMIT_BLOCK_SECONDS', 300),
    MEMORY_HISTORY_FETCH_LIMIT: positiveInt('MEMORY_HISTORY_FETCH_LIMIT', 30),
    MEMORY_HISTORY_REPLAY_LIMIT: positiveInt('MEMORY_HISTORY_REPLAY_LIMIT', 10),
    MEMORY_LOAD_FAILURE_POLICY: z
      .string()
      .optional()
      .transform((value) => (value ? value.toLowerCase() : 'empty'))
      .pipe(z.enum(['empty', 'abort'])),
    GREETING_INSTRUCTION: z.string().min(1).optional(),
    PROACTIVE_ENABLED: flag(true),
    PROACTIVE_CHECK_INTERVAL_SECONDS: positiveInt('PROACTIVE_CHECK_INTERVAL_SECONDS', 300),
    GOOGLE_API_KEY: z.string().min(1).optional(),
    GOOGLE_CSE_ID: z.string().min(1).optional(),
  })
  .refine((env) => env.MEMORY_HISTORY_REPLAY_LIMIT <= env.MEMORY_HISTORY_FETCH_LIMIT, {
    message: 'MEMORY_HISTORY_REPLAY_LIMIT cannot exceed MEMORY_HISTORY_FETCH_LIMIT',
  });

export type MemoryLoadFailurePolicy = z.infer<typeof envSchema>['MEMORY_LOAD_FAILURE_POLICY'];

export interface CacheSettings {
  ttlSeconds: number;
  maxSize: number;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  logLevel?: string;
  adminToken?: string;
  cache: {
    cryptoPrice: CacheSettings;
    weather: CacheSettings;
    webSearch: CacheSettings;
  };
  rateLimit: {
    maxRequests: number;
    windowMs: number;
    blockDurationMs: number;
  };
  memory: {
    historyFetchLimit: number;
    historyReplayLimit: number;
    failurePolicy: MemoryLoadFailurePolicy;
    greetingInstruction?: string;
  };
  proactive: {
    enabled: boolean;
    checkIntervalMs: number;
  };
  search: {
    googleApiKey?: string;
    googleSearchEngineId?: string;
  };
}

/**
 * Parse and validate configuration from the provided environment source,
 * returning a strongly typed settings object or throwing a descriptive error
 * if any variable is malformed.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const firstError = result.error.issues[0];
    throw new Error(firstError?.message ?? 'Invalid environment configuration');
  }

  const env = result.data;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    adminToken: env.ADMIN_API_TOKEN,
    cache: {
      cryptoPrice: {
        ttlSeconds: env.CRYPTO_PRICE_CACHE_TTL_SECONDS,
        maxSize: env.CRYPTO_PRICE_CACHE_MAX_SIZE,
      },
      weather: {
        ttlSeconds: env.WEATHER_CACHE_TTL_SECONDS,
        maxSize: env.WEATHER_CACHE_MAX_SIZE,
      },
      webSearch: {
        ttlSeconds: env.WEB_SEARCH_CACHE_TTL_SECONDS,
        maxSize: env.WEB_SEARCH_CACHE_MAX_SIZE,
      },
    },
    rateLimit: {
      maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
      windowMs: env.RATE_LIMIT_WINDOW_SECONDS * 1000,
      blockDurationMs: env.RATE_LIMIT_BLOCK_SECONDS * 1000,
    },
    memory: {
      historyFetchLimit: env.MEMORY_HISTORY_FETCH_LIMIT,
      historyReplayLimit: env.MEMORY_HISTORY_REPLAY_LIMIT,
      failurePolicy: env.MEMORY_LOAD_FAILURE_POLICY,
      greetingInstruction: env.GREETING_INSTRUCTION,
    },
    proactive: {
      enabled: env.PROACTIVE_ENABLED,
      checkIntervalMs: env.PROACTIVE_CHECK_INTERVAL_SECONDS * 1000,
    },
    search: {
      googleApiKey: env.GOOGLE_API_KEY,
      googleSearchEngineId: env.GOOGLE_CSE_ID,
    },
  };
}

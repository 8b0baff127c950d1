import {
  ConversationContext,
  MemoryAggregator,
  RateLimiter,
  SessionRegistry,
} from '@session-governor/core';

import { loadConfig, type AppConfig } from './config';
import { createServer, type GatewayFastifyInstance } from './server';
import {
  InMemorySummaryStore,
  InMemoryUserStateStore,
  InMemoryVectorMemoryStore,
  type UserStateRepository,
} from './services/memory';
import { ProactiveScheduler } from './services/proactive';
import {
  ExtractiveSummarizer,
  SessionLifecycleService,
  type AssistantSessionRegistry,
  type SessionAgent,
} from './services/session';
import { createAssistantTools, fetchHttpClient, type AssistantTools, type HttpClient } from './services/tools';
import { componentLogger, createLogger, type AppLogger } from './telemetry/logger';
import { createMetrics, type GatewayMetrics } from './telemetry/metrics';

export interface ApplicationOptions {
  env?: NodeJS.ProcessEnv;
  logger?: AppLogger;
  httpClient?: HttpClient;
}

export interface Application {
  config: AppConfig;
  logger: AppLogger;
  metrics: GatewayMetrics;
  server: GatewayFastifyInstance;
  registry: AssistantSessionRegistry;
  rateLimiter: RateLimiter;
  userState: UserStateRepository;
  tools: AssistantTools;
  sessions: SessionLifecycleService;
  scheduler: ProactiveScheduler;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Compose the assistant gateway: one rate limiter, one session registry and
 * one cache per tool for the whole process, the memory stores and aggregator,
 * the session lifecycle, the proactive scheduler and the Fastify server.
 */
export async function createApplication(options: ApplicationOptions = {}): Promise<Application> {
  const config = loadConfig(options.env);
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const metrics = createMetrics();

  const rateLimiter = new RateLimiter({
    maxRequests: config.rateLimit.maxRequests,
    windowMs: config.rateLimit.windowMs,
    blockDurationMs: config.rateLimit.blockDurationMs,
    logger: componentLogger(logger, 'rate-limiter'),
  });
  const registry: AssistantSessionRegistry = new SessionRegistry<ConversationContext, SessionAgent>(
    componentLogger(logger, 'session-registry'),
  );

  const userState = new InMemoryUserStateStore();
  const summaries = new InMemorySummaryStore();
  const vectorMemory = new InMemoryVectorMemoryStore();

  const aggregator = new MemoryAggregator(
    { userState, summaries, vectorMemory, logger: componentLogger(logger, 'memory') },
    {
      historyFetchLimit: config.memory.historyFetchLimit,
      historyReplayLimit: config.memory.historyReplayLimit,
      greetingInstruction: config.memory.greetingInstruction,
    },
  );

  const tools = createAssistantTools(
    config,
    { rateLimiter, metrics, logger: componentLogger(logger, 'tools') },
    options.httpClient ?? fetchHttpClient,
  );

  const sessions = new SessionLifecycleService(
    aggregator,
    registry,
    { summaries, vectorMemory },
    new ExtractiveSummarizer(),
    metrics,
    componentLogger(logger, 'sessions'),
    {
      failurePolicy: config.memory.failurePolicy,
      greetingInstruction: config.memory.greetingInstruction,
    },
  );

  const scheduler = new ProactiveScheduler(userState, registry, metrics, componentLogger(logger, 'proactive'), {
    checkIntervalMs: config.proactive.checkIntervalMs,
  });

  const server = await createServer({
    config,
    logger,
    metrics,
    registry,
    rateLimiter,
    caches: tools.caches,
  });

  return {
    config,
    logger,
    metrics,
    server,
    registry,
    rateLimiter,
    userState,
    tools,
    sessions,
    scheduler,
    start: () => startApplication(server, scheduler, config),
    stop: () => stopApplication(server, scheduler),
  };
}

/** Start the HTTP server on all interfaces and, if enabled, the proactive scheduler. */
async function startApplication(
  server: GatewayFastifyInstance,
  scheduler: ProactiveScheduler,
  config: AppConfig,
): Promise<void> {
  await server.listen({ port: config.port, host: '0.0.0.0' });

  if (config.proactive.enabled) {
    scheduler.start();
  }
}

async function stopApplication(server: GatewayFastifyInstance, scheduler: ProactiveScheduler): Promise<void> {
  scheduler.stop();
  await server.close();
}

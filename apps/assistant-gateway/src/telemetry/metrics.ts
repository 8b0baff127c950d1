import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type ToolOutcome = 'hit' | 'miss' | 'rate_limited' | 'error';

export interface GatewayMetrics {
  registry: Registry;
  requestCounter: Counter<string>;
  requestDuration: Histogram<string>;
  toolCalls: Counter<string>;
  rateLimitRejections: Counter<string>;
  activeSessions: Gauge<string>;
  memoryLoadFailures: Counter<string>;
  proactiveMessages: Counter<string>;
}

export interface MetricsOptions {
  prefix?: string;
  registry?: Registry;
  collectDefaults?: boolean;
}

export function createMetrics(options: MetricsOptions = {}): GatewayMetrics {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? 'assistant_gateway_';

  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const requestCounter = new Counter({
    name: `${prefix}requests_total`,
    help: 'Total number of HTTP requests handled by the gateway routes',
    labelNames: ['route', 'status'],
    registers: [registry],
  });

  const requestDuration = new Histogram({
    name: `${prefix}request_duration_seconds`,
    help: 'HTTP request duration in seconds',
    labelNames: ['route', 'status'],
    buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1],
    registers: [registry],
  });

  const toolCalls = new Counter({
    name: `${prefix}tool_calls_total`,
    help: 'Governed tool invocations by outcome',
    labelNames: ['tool', 'outcome'],
    registers: [registry],
  });

  const rateLimitRejections = new Counter({
    name: `${prefix}rate_limit_rejections_total`,
    help: 'Requests rejected by the per-user rate limiter',
    labelNames: ['tool'],
    registers: [registry],
  });

  const activeSessions = new Gauge({
    name: `${prefix}active_sessions`,
    help: 'Sessions currently present in the session registry',
    registers: [registry],
  });

  const memoryLoadFailures = new Counter({
    name: `${prefix}memory_load_failures_total`,
    help: 'Session starts whose memory aggregation failed',
    labelNames: ['source'],
    registers: [registry],
  });

  const proactiveMessages = new Counter({
    name: `${prefix}proactive_messages_total`,
    help: 'Agent-initiated follow-ups by delivery channel',
    labelNames: ['channel'],
    registers: [registry],
  });

  return {
    registry,
    requestCounter,
    requestDuration,
    toolCalls,
    rateLimitRejections,
    activeSessions,
    memoryLoadFailures,
    proactiveMessages,
  };
}

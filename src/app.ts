// Application assembly
// Wires breakers, tools, reasoning and routes into one Fastify instance

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import type { AppLogger } from './observability/logger.js';
import { MetricsTracker } from './observability/metrics.js';
import type { ReasoningBackend } from './providers/types.js';
import { Orchestrator, type OrchestratorOptions } from './services/orchestrator/index.js';
import { createBreakerRegistry, type BreakerRegistry, type CircuitBreakerConfig } from './services/resilience/index.js';
import { ToolCallDispatcher, initializeTools, type ToolBackend, type ToolSource } from './services/tools/index.js';
import type { Dependency } from './utils/errors.js';
import { chatRoutes } from './routes/chat.js';
import { healthRoutes } from './routes/health.js';

export interface AppSettings {
  breakers: Record<Dependency, CircuitBreakerConfig>;
  toolCallTimeoutMs: number;
  orchestrator: OrchestratorOptions;
  maxInputLength: number;
  heartbeatMs: number;
  queueCapacity: number;
  corsOrigins?: string[];
}

export interface BuildAppOptions {
  settings: AppSettings;
  reasoning: ReasoningBackend;
  /** Discovery is skipped when `discoverTools` is false; calls always go here. */
  toolBackend: ToolBackend;
  discoverTools?: boolean;
  fastify?: FastifyServerOptions;
  now?: () => number;
}

export interface AppServices {
  breakers: BreakerRegistry;
  metrics: MetricsTracker;
  orchestrator: Orchestrator;
  toolSource: ToolSource;
}

export async function createServices(options: BuildAppOptions, logger: AppLogger): Promise<AppServices> {
  const metrics = new MetricsTracker();
  const breakers = createBreakerRegistry({
    logger,
    metrics,
    config: options.settings.breakers,
    now: options.now,
  });

  const { registry, source } = await initializeTools({
    logger: logger.child({ component: 'tools' }),
    backend: options.discoverTools === false ? undefined : options.toolBackend,
    breaker: breakers.toolBackend,
  });

  const dispatcher = new ToolCallDispatcher({
    registry,
    backend: options.toolBackend,
    breaker: breakers.toolBackend,
    timeoutMs: options.settings.toolCallTimeoutMs,
    metrics,
    now: options.now,
  });

  const orchestrator = new Orchestrator(
    { reasoning: options.reasoning, dispatcher, registry, breakers, metrics },
    { ...options.settings.orchestrator, now: options.settings.orchestrator.now ?? options.now },
  );

  return { breakers, metrics, orchestrator, toolSource: source };
}

export async function buildApp(options: BuildAppOptions): Promise<{ server: FastifyInstance; services: AppServices }> {
  const server = Fastify(options.fastify ?? {});
  const services = await createServices(options, server.log);

  if (options.settings.corsOrigins && options.settings.corsOrigins.length > 0) {
    await server.register(cors, {
      origin: options.settings.corsOrigins,
      exposedHeaders: ['X-Request-Id'],
    });
  }

  await server.register(
    healthRoutes({
      breakers: services.breakers,
      metrics: services.metrics,
      toolSource: services.toolSource,
      now: options.now,
    }),
    { prefix: '/v1' },
  );

  // Legacy redirect
  server.get('/health', async (_request, reply) => {
    return reply.redirect('/v1/health', 301);
  });

  await server.register(
    chatRoutes({
      orchestrator: services.orchestrator,
      metrics: services.metrics,
      maxInputLength: options.settings.maxInputLength,
      heartbeatMs: options.settings.heartbeatMs,
      queueCapacity: options.settings.queueCapacity,
    }),
    { prefix: '/v1' },
  );

  return { server, services };
}

// Health route
// Breaker phases decide the status; metrics ride along for dashboards

import type { FastifyInstance } from 'fastify';
import { snapshotBreakers, type BreakerRegistry } from '../services/resilience/index.js';
import type { MetricsTracker } from '../observability/metrics.js';
import type { ToolSource } from '../services/tools/index.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthRouteDeps {
  breakers: BreakerRegistry;
  metrics: MetricsTracker;
  toolSource: ToolSource;
  startedAt?: number;
  now?: () => number;
}

export function healthStatus(breakers: BreakerRegistry): HealthStatus {
  const phases = [breakers.toolBackend.getPhase(), breakers.reasoningBackend.getPhase()];
  if (phases.every(phase => phase === 'Open')) return 'unhealthy';
  if (phases.some(phase => phase !== 'Closed')) return 'degraded';
  return 'healthy';
}

export function healthRoutes(deps: HealthRouteDeps) {
  const now = deps.now ?? Date.now;
  const startedAt = deps.startedAt ?? now();

  return async function (server: FastifyInstance) {
    // GET /v1/health
    server.get('/health', async () => {
      return {
        status: healthStatus(deps.breakers),
        timestamp: new Date(now()).toISOString(),
        version: '1.0.0',
        uptimeSeconds: Math.floor((now() - startedAt) / 1000),
        toolSource: deps.toolSource,
        circuitBreakers: snapshotBreakers(deps.breakers),
        metrics: deps.metrics.getSummary(),
      };
    });
  };
}

// Breaker registry
// Created once at startup and injected; the only state shared across requests

import type { AppLogger } from '../../observability/logger.js';
import type { MetricsTracker } from '../../observability/metrics.js';
import type { Dependency } from '../../utils/errors.js';
import { CircuitBreaker, type CircuitBreakerConfig, type CircuitBreakerSnapshot } from './circuit-breaker.js';

export interface BreakerRegistry {
  readonly toolBackend: CircuitBreaker;
  readonly reasoningBackend: CircuitBreaker;
}

export interface BreakerRegistryOptions {
  logger: AppLogger;
  metrics?: MetricsTracker;
  config: Record<Dependency, CircuitBreakerConfig>;
  now?: () => number;
}

export function createBreakerRegistry(options: BreakerRegistryOptions): BreakerRegistry {
  const logger = options.logger.child({ component: 'circuit-breaker' });
  const onReject = (dependency: Dependency) => options.metrics?.trackBreakerRejection(dependency);

  return Object.freeze({
    toolBackend: new CircuitBreaker('ToolBackend', options.config.ToolBackend, {
      logger,
      now: options.now,
      onReject,
    }),
    reasoningBackend: new CircuitBreaker('ReasoningBackend', options.config.ReasoningBackend, {
      logger,
      now: options.now,
      onReject,
    }),
  });
}

export function snapshotBreakers(registry: BreakerRegistry): {
  toolBackend: CircuitBreakerSnapshot;
  reasoningBackend: CircuitBreakerSnapshot;
} {
  return {
    toolBackend: registry.toolBackend.snapshot(),
    reasoningBackend: registry.reasoningBackend.snapshot(),
  };
}

export { CircuitBreaker, DEFAULT_BREAKER_CONFIG } from './circuit-breaker.js';
export type {
  BreakerPermit,
  BreakerPhase,
  CircuitBreakerConfig,
  CircuitBreakerSnapshot,
  CircuitBreakerState,
} from './circuit-breaker.js';

/**
 * Circuit Breaker
 *
 * One instance per external dependency, shared by every in-flight request.
 *
 * States:
 * - Closed: calls pass through; consecutive failures are counted
 * - Open: calls are refused without touching the dependency
 * - HalfOpen: a bounded number of probe calls test whether the dependency recovered
 *
 * Every read-decide-write on the state happens synchronously inside one method,
 * so no two requests can interleave between a check and its update. Outcomes are
 * reported through a single-use permit stamped with the phase epoch it was issued
 * in; outcomes from an older epoch are dropped.
 */

import { CircuitOpenError, type Dependency } from '../../utils/errors.js';
import { logEvent, type AppLogger } from '../../observability/logger.js';

export type BreakerPhase = 'Closed' | 'Open' | 'HalfOpen';

export interface CircuitBreakerConfig {
  /** Consecutive failures in Closed before opening */
  failureThreshold: number;
  /** Time in ms Open must last before a probe is allowed */
  recoveryTimeoutMs: number;
  /** Probe successes in HalfOpen required to close; also the in-flight probe cap */
  probeQuota: number;
}

export interface CircuitBreakerState {
  dependency: Dependency;
  phase: BreakerPhase;
  consecutiveFailures: number;
  consecutiveProbeSuccesses: number;
  openedAt: Date | null;
}

export interface CircuitBreakerSnapshot extends Readonly<CircuitBreakerState> {
  readonly probesInFlight: number;
  readonly rejectedCalls: number;
  readonly retryAfterMs: number;
}

export interface CircuitBreakerOptions {
  logger: AppLogger;
  now?: () => number;
  onStateChange?: (from: BreakerPhase, to: BreakerPhase, state: CircuitBreakerSnapshot) => void;
  onReject?: (dependency: Dependency) => void;
}

/** A single admitted call. The first settlement wins; later ones are ignored. */
export interface BreakerPermit {
  readonly epoch: number;
  readonly probe: boolean;
  success(): void;
  failure(error?: unknown): void;
  /** The caller gave up on the call; it counts as neither outcome. */
  abandon(): void;
}

export interface GuardOptions {
  /** When this signal is aborted by the time the call settles, the outcome is abandoned. */
  signal?: AbortSignal;
}

export const DEFAULT_BREAKER_CONFIG: Record<Dependency, CircuitBreakerConfig> = {
  ToolBackend: { failureThreshold: 5, recoveryTimeoutMs: 30_000, probeQuota: 3 },
  ReasoningBackend: { failureThreshold: 3, recoveryTimeoutMs: 60_000, probeQuota: 2 },
};

function validateConfig(config: CircuitBreakerConfig): void {
  if (!Number.isInteger(config.failureThreshold) || config.failureThreshold < 1) {
    throw new Error('failureThreshold must be an integer >= 1');
  }
  if (!Number.isFinite(config.recoveryTimeoutMs) || config.recoveryTimeoutMs < 0) {
    throw new Error('recoveryTimeoutMs must be >= 0');
  }
  if (!Number.isInteger(config.probeQuota) || config.probeQuota < 1) {
    throw new Error('probeQuota must be an integer >= 1');
  }
}

export class CircuitBreaker {
  readonly dependency: Dependency;
  private readonly config: CircuitBreakerConfig;
  private readonly logger: AppLogger;
  private readonly now: () => number;
  private readonly onStateChange?: CircuitBreakerOptions['onStateChange'];
  private readonly onReject?: CircuitBreakerOptions['onReject'];

  private phase: BreakerPhase = 'Closed';
  private consecutiveFailures = 0;
  private consecutiveProbeSuccesses = 0;
  private openedAt: number | null = null;
  private probesInFlight = 0;
  private rejectedCalls = 0;
  private epoch = 0;

  constructor(dependency: Dependency, config: CircuitBreakerConfig, options: CircuitBreakerOptions) {
    validateConfig(config);
    this.dependency = dependency;
    this.config = { ...config };
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.onStateChange = options.onStateChange;
    this.onReject = options.onReject;
  }

  /**
   * Decide whether a call may proceed. Throws CircuitOpenError when it may not.
   */
  acquire(): BreakerPermit {
    if (this.phase === 'Open' && this.recoveryElapsed()) {
      this.transitionTo('HalfOpen');
    }

    if (this.phase === 'Open') {
      this.reject();
    }

    let probe = false;
    if (this.phase === 'HalfOpen') {
      if (this.probesInFlight + this.consecutiveProbeSuccesses >= this.config.probeQuota) {
        this.reject();
      }
      this.probesInFlight++;
      probe = true;
    }

    return this.createPermit(this.epoch, probe);
  }

  /**
   * Run `fn` through the breaker. Any rejection from `fn` counts as a failure
   * unless the guard's signal was aborted first.
   */
  async guard<T>(fn: () => Promise<T>, options: GuardOptions = {}): Promise<T> {
    const permit = this.acquire();
    try {
      const result = await fn();
      if (options.signal?.aborted) {
        permit.abandon();
      } else {
        permit.success();
      }
      return result;
    } catch (error) {
      if (options.signal?.aborted) {
        permit.abandon();
      } else {
        permit.failure(error);
      }
      throw error;
    }
  }

  snapshot(): CircuitBreakerSnapshot {
    return Object.freeze({
      dependency: this.dependency,
      phase: this.phase,
      consecutiveFailures: this.consecutiveFailures,
      consecutiveProbeSuccesses: this.consecutiveProbeSuccesses,
      openedAt: this.openedAt === null ? null : new Date(this.openedAt),
      probesInFlight: this.probesInFlight,
      rejectedCalls: this.rejectedCalls,
      retryAfterMs: this.retryAfterMs(),
    });
  }

  getPhase(): BreakerPhase {
    return this.phase;
  }

  /** Administrative reset to Closed. */
  reset(): void {
    this.transitionTo('Closed');
  }

  private createPermit(epoch: number, probe: boolean): BreakerPermit {
    let settled = false;
    const settle = (apply: () => void) => {
      if (settled) return;
      settled = true;
      if (epoch !== this.epoch) return;
      if (probe) this.probesInFlight--;
      apply();
    };

    return {
      epoch,
      probe,
      success: () => settle(() => this.recordSuccess()),
      failure: (error?: unknown) => settle(() => this.recordFailure(error)),
      abandon: () => settle(() => undefined),
    };
  }

  private recordSuccess(): void {
    if (this.phase === 'HalfOpen') {
      this.consecutiveProbeSuccesses++;
      if (this.consecutiveProbeSuccesses >= this.config.probeQuota) {
        this.transitionTo('Closed');
      }
      return;
    }

    if (this.phase === 'Closed') {
      this.consecutiveFailures = 0;
    }
  }

  private recordFailure(error: unknown): void {
    if (this.phase === 'HalfOpen') {
      this.transitionTo('Open', error);
      return;
    }

    if (this.phase === 'Closed') {
      this.consecutiveFailures++;
      if (this.consecutiveFailures >= this.config.failureThreshold) {
        this.transitionTo('Open', error);
      }
    }
  }

  private reject(): never {
    this.rejectedCalls++;
    this.onReject?.(this.dependency);
    throw new CircuitOpenError(this.dependency, this.retryAfterMs());
  }

  private recoveryElapsed(): boolean {
    return this.openedAt !== null && this.now() - this.openedAt >= this.config.recoveryTimeoutMs;
  }

  private retryAfterMs(): number {
    if (this.phase !== 'Open' || this.openedAt === null) return 0;
    return Math.max(0, this.openedAt + this.config.recoveryTimeoutMs - this.now());
  }

  private transitionTo(next: BreakerPhase, error?: unknown): void {
    const previous = this.phase;
    const failureCount = this.consecutiveFailures;

    this.phase = next;
    this.epoch++;
    this.probesInFlight = 0;
    this.consecutiveProbeSuccesses = 0;

    if (next === 'Open') {
      this.openedAt = this.now();
    } else if (next === 'Closed') {
      this.consecutiveFailures = 0;
      this.openedAt = null;
    }

    const details: Record<string, unknown> = {
      dependency: this.dependency,
      from: previous,
      to: next,
      consecutiveFailures: failureCount,
    };
    if (error !== undefined) {
      details.lastError = error instanceof Error ? error.message : String(error);
    }

    logEvent(
      this.logger,
      next === 'Open' ? 'warn' : 'info',
      'circuit_breaker_state_change',
      `${this.dependency} circuit ${previous} -> ${next}`,
      { details },
    );

    this.onStateChange?.(previous, next, this.snapshot());
  }
}

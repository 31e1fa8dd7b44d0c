// In-process request metrics
// Aggregate counters only; per-request state lives on the RequestContext

import type { Dependency } from '../utils/errors.js';

export type RequestOutcome = 'completed' | 'failed' | 'cancelled';

interface ToolCallStats {
  calls: number;
  failures: number;
  totalDurationMs: number;
}

export interface MetricsSummary {
  totalRequests: number;
  rejectedRequests: number;
  completedRequests: number;
  failedRequests: number;
  cancelledRequests: number;
  activeRequests: number;
  successRate: number;
  avgRequestDurationMs: number;
  reasoningTurns: number;
  breakerRejections: Record<Dependency, number>;
  toolCalls: Record<string, { calls: number; failures: number; avgDurationMs: number }>;
}

/** Metrics key for calls to tool names the registry does not know. */
export const UNKNOWN_TOOL = 'unknown';

const round = (value: number) => Math.round(value * 100) / 100;

export class MetricsTracker {
  private totalRequests = 0;
  private rejectedRequests = 0;
  private outcomes: Record<RequestOutcome, number> = { completed: 0, failed: 0, cancelled: 0 };
  private totalRequestDurationMs = 0;
  private reasoningTurns = 0;
  private breakerRejections: Record<Dependency, number> = { ToolBackend: 0, ReasoningBackend: 0 };
  private toolStats = new Map<string, ToolCallStats>();

  trackRequestReceived(): void {
    this.totalRequests++;
  }

  /** Admission failure, answered before any streaming. */
  trackRequestRejected(): void {
    this.totalRequests++;
    this.rejectedRequests++;
  }

  trackRequestFinished(outcome: RequestOutcome, durationMs: number): void {
    this.outcomes[outcome]++;
    this.totalRequestDurationMs += durationMs;
  }

  trackReasoningTurn(): void {
    this.reasoningTurns++;
  }

  trackBreakerRejection(dependency: Dependency): void {
    this.breakerRejections[dependency]++;
  }

  trackToolCall(toolName: string, success: boolean, durationMs: number): void {
    const stats = this.toolStats.get(toolName) ?? { calls: 0, failures: 0, totalDurationMs: 0 };
    stats.calls++;
    if (!success) stats.failures++;
    stats.totalDurationMs += durationMs;
    this.toolStats.set(toolName, stats);
  }

  getSummary(): MetricsSummary {
    const finished = this.outcomes.completed + this.outcomes.failed + this.outcomes.cancelled;
    const toolCalls: MetricsSummary['toolCalls'] = {};
    for (const [name, stats] of this.toolStats) {
      toolCalls[name] = {
        calls: stats.calls,
        failures: stats.failures,
        avgDurationMs: stats.calls > 0 ? round(stats.totalDurationMs / stats.calls) : 0,
      };
    }

    return {
      totalRequests: this.totalRequests,
      rejectedRequests: this.rejectedRequests,
      completedRequests: this.outcomes.completed,
      failedRequests: this.outcomes.failed,
      cancelledRequests: this.outcomes.cancelled,
      activeRequests: this.totalRequests - this.rejectedRequests - finished,
      successRate: finished > 0 ? round(this.outcomes.completed / finished) : 1,
      avgRequestDurationMs: finished > 0 ? round(this.totalRequestDurationMs / finished) : 0,
      reasoningTurns: this.reasoningTurns,
      breakerRejections: { ...this.breakerRejections },
      toolCalls,
    };
  }

  reset(): void {
    this.totalRequests = 0;
    this.rejectedRequests = 0;
    this.outcomes = { completed: 0, failed: 0, cancelled: 0 };
    this.totalRequestDurationMs = 0;
    this.reasoningTurns = 0;
    this.breakerRejections = { ToolBackend: 0, ReasoningBackend: 0 };
    this.toolStats.clear();
  }
}

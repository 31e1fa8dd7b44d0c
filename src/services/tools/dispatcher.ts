// Tool call dispatcher
// Turns a reasoning-backend tool-call intent into at most one guarded Tool Backend call

import type { RequestContext } from '../correlation.js';
import type { StreamSink } from '../streaming/streamer.js';
import type { CircuitBreaker } from '../resilience/circuit-breaker.js';
import { UNKNOWN_TOOL, type MetricsTracker } from '../../observability/metrics.js';
import { logEvent } from '../../observability/logger.js';
import { withDeadline } from '../../utils/timeout.js';
import {
  CircuitOpenError,
  DependencyTimeoutError,
  ToolBackendError,
  errorMessage,
  type ToolErrorKind,
} from '../../utils/errors.js';
import type { ToolRegistry } from './registry.js';
import { describeIssues } from './schema.js';
import type { ToolBackend, ToolCallIntent, ToolCallResult } from './types.js';

export const DEFAULT_TOOL_CALL_TIMEOUT_MS = 30000;

export interface DispatcherOptions {
  registry: ToolRegistry;
  backend: ToolBackend;
  breaker: CircuitBreaker;
  timeoutMs?: number;
  metrics?: MetricsTracker;
  now?: () => number;
}

/** Accepts `true`, `"true"`, `"yes"` and `1`; anything else is not a confirmation. */
export function isConfirmed(args: Record<string, unknown>): boolean {
  const value = args.confirmation;
  if (typeof value === 'string') {
    return ['true', 'yes'].includes(value.trim().toLowerCase());
  }
  return value === true || value === 1;
}

function failure(toolName: string, errorKind: ToolErrorKind, message: string): ToolCallResult {
  return { toolName, success: false, payload: null, errorKind, message };
}

export class ToolCallDispatcher {
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(private readonly options: DispatcherOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_CALL_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  async dispatch(intent: ToolCallIntent, ctx: RequestContext, sink: StreamSink): Promise<ToolCallResult> {
    const startTime = this.now();
    sink.emit({
      type: 'tool_call',
      toolName: intent.toolName,
      arguments: intent.arguments,
      status: 'in_progress',
    });

    const result = await this.execute(intent);
    const durationMs = this.now() - startTime;

    const metricsKey = this.options.registry.has(intent.toolName) ? intent.toolName : UNKNOWN_TOOL;
    this.options.metrics?.trackToolCall(metricsKey, result.success, durationMs);
    logEvent(ctx.logger, result.success ? 'info' : 'warn', 'tool_call_finished', `Tool ${intent.toolName} ${result.success ? 'succeeded' : 'failed'}`, {
      durationMs,
      details: {
        toolName: intent.toolName,
        success: result.success,
        ...(result.errorKind ? { errorKind: result.errorKind, error: result.message } : {}),
      },
    });

    // After cancellation the sink drops both events; the result still returns to the caller.
    if (result.success) {
      sink.emit({
        type: 'tool_call',
        toolName: intent.toolName,
        arguments: intent.arguments,
        status: 'success',
        result: result.payload,
      });
    } else {
      sink.emit({
        type: 'tool_call',
        toolName: intent.toolName,
        arguments: intent.arguments,
        status: 'failed',
        errorKind: result.errorKind,
        result: { message: result.message },
      });
    }

    return result;
  }

  private async execute(intent: ToolCallIntent): Promise<ToolCallResult> {
    const { registry, backend, breaker } = this.options;
    const name = intent.toolName;
    if (intent.argumentsError) {
      return failure(name, 'InvalidArguments', `Invalid arguments for "${name}": ${intent.argumentsError}`);
    }

    const destructive = intent.isDestructive || registry.isDestructive(name);

    if (destructive && !isConfirmed(intent.arguments)) {
      return failure(name, 'InvalidArguments', `"${name}" is destructive and requires confirmation: true`);
    }

    const validator = registry.getValidator(name);
    if (!validator) {
      return failure(name, 'NotFound', `Unknown tool "${name}"`);
    }

    const parsed = validator.safeParse(intent.arguments);
    if (!parsed.success) {
      return failure(name, 'InvalidArguments', `Invalid arguments for "${name}": ${describeIssues(parsed.error)}`);
    }

    try {
      const payload = await breaker.guard(() =>
        withDeadline(signal => backend.callTool(name, parsed.data, { signal }), {
          timeoutMs: this.timeoutMs,
          dependency: 'ToolBackend',
        }),
      );
      return { toolName: name, success: true, payload, errorKind: null };
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        return failure(name, 'DependencyUnavailable', error.message);
      }
      if (error instanceof ToolBackendError) {
        return failure(name, error.kind, error.message);
      }
      if (error instanceof DependencyTimeoutError) {
        return failure(name, 'Timeout', error.message);
      }
      return failure(name, 'DependencyUnavailable', `Tool Backend call failed: ${errorMessage(error)}`);
    }
  }
}

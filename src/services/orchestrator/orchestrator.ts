// Request orchestrator
// Admitted -> Reasoning -> (Dispatching)* -> Finalizing -> Done | Error, or Cancelled from any state

import type { ProviderMessage, ReasoningBackend, ReasoningFragment, ToolCall } from '../../providers/types.js';
import type { RequestContext } from '../correlation.js';
import type { BreakerRegistry } from '../resilience/index.js';
import type { StreamSink } from '../streaming/streamer.js';
import type { ToolCallDispatcher } from '../tools/dispatcher.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolCallIntent, ToolCallResult } from '../tools/types.js';
import type { MetricsTracker } from '../../observability/metrics.js';
import { logEvent } from '../../observability/logger.js';
import { raceWithDeadline } from '../../utils/timeout.js';
import {
  CircuitOpenError,
  DependencyTimeoutError,
  OrchestratorError,
  RequestCancelledError,
  StreamContractError,
  errorMessage,
} from '../../utils/errors.js';
import type { OrchestratorOptions, OrchestratorPhase, RunSummary, TerminalPhase } from './types.js';

export const DEFAULT_REASONING_TIMEOUT_MS = 30000;
export const DEFAULT_MAX_TURNS = 8;
export const EMPTY_OUTPUT_FALLBACK = 'Request processed successfully.';
export const INITIAL_THINKING = 'Processing your request and analyzing intent...';

export const SYSTEM_PROMPT = `You are a todo management assistant. Use the available tools to create, list, update and delete todo items.

Rules:
- Call a tool whenever the user asks to change or inspect their todos; never invent ids.
- Deleting is permanent. Only pass confirmation: true after the user has explicitly agreed to the deletion.
- If a tool call fails, explain the failure briefly instead of retrying the same call.
- Keep answers short and describe what was done.`;

export interface OrchestratorDeps {
  reasoning: ReasoningBackend;
  dispatcher: ToolCallDispatcher;
  registry: ToolRegistry;
  breakers: BreakerRegistry;
  metrics?: MetricsTracker;
}

interface TurnOutcome {
  text: string;
  intents: ToolCallIntent[];
}

/** Mutable state of one run; never shared between requests. */
interface RunState {
  ctx: RequestContext;
  sink: StreamSink;
  phase: OrchestratorPhase;
  conversation: ProviderMessage[];
  accumulated: string;
  toolsCalled: string[];
  toolResults: ToolCallResult[];
  turns: number;
}

function toToolMessage(intent: ToolCallIntent, result: ToolCallResult): ProviderMessage {
  const content = result.success
    ? { success: true, result: result.payload }
    : { success: false, errorKind: result.errorKind, error: result.message };
  return { role: 'tool', tool_call_id: intent.callId, name: intent.toolName, content: JSON.stringify(content) };
}

function upstreamFailure(cause: unknown): OrchestratorError {
  return new OrchestratorError('UpstreamFailure', 'The reasoning service failed to respond', true, { cause });
}

export class Orchestrator {
  private readonly reasoningTimeoutMs: number;
  private readonly maxTurns: number;
  private readonly systemPrompt: string;
  private readonly now: () => number;

  constructor(
    private readonly deps: OrchestratorDeps,
    options: OrchestratorOptions = {},
  ) {
    this.reasoningTimeoutMs = options.reasoningTimeoutMs ?? DEFAULT_REASONING_TIMEOUT_MS;
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
    this.now = options.now ?? Date.now;
  }

  /**
   * Drives one admitted request to a terminal phase. Never rejects: failures
   * surface as one `error` event, cancellation as no terminal event at all.
   */
  async run(ctx: RequestContext, sink: StreamSink): Promise<RunSummary> {
    const startTime = this.now();
    const state: RunState = {
      ctx,
      sink,
      phase: 'Admitted',
      conversation: [
        { role: 'system', content: this.systemPrompt },
        { role: 'user', content: ctx.request.sanitizedInput },
      ],
      accumulated: '',
      toolsCalled: [],
      toolResults: [],
      turns: 0,
    };

    this.deps.metrics?.trackRequestReceived();
    logEvent(ctx.logger, 'info', 'request_received', 'Request admitted', {
      details: { inputLength: ctx.request.sanitizedInput.length },
    });

    try {
      sink.emit({ type: 'thinking', content: INITIAL_THINKING });
      await this.reason(state);
      this.finalize(state);
    } catch (error) {
      this.fail(state, error);
    } finally {
      sink.close();
    }

    const durationMs = this.now() - startTime;
    this.logOutcome(state, durationMs);

    return {
      phase: this.terminalPhase(state),
      finalOutput: state.accumulated,
      toolsCalled: [...state.toolsCalled],
      toolResults: [...state.toolResults],
      turns: state.turns,
      durationMs,
    };
  }

  private async reason(state: RunState): Promise<void> {
    while (true) {
      this.throwIfCancelled(state);
      if (state.turns >= this.maxTurns) {
        throw new OrchestratorError(
          'UpstreamFailure',
          `Reasoning did not conclude within ${this.maxTurns} turns`,
          true,
        );
      }

      state.turns++;
      state.phase = 'Reasoning';
      this.deps.metrics?.trackReasoningTurn();
      logEvent(state.ctx.logger, 'debug', 'reasoning_turn_started', `Reasoning turn ${state.turns}`, {
        details: { turn: state.turns },
      });

      const outcome = await this.deps.breakers.reasoningBackend.guard(
        () => this.consumeTurn(state),
        { signal: state.ctx.signal },
      );

      if (outcome.intents.length === 0) {
        return;
      }

      const toolCalls: ToolCall[] = outcome.intents.map(intent => ({
        id: intent.callId,
        name: intent.toolName,
        arguments: JSON.stringify(intent.arguments),
      }));
      state.conversation.push({ role: 'assistant', content: outcome.text, tool_calls: toolCalls });

      state.phase = 'Dispatching';
      for (const intent of outcome.intents) {
        this.throwIfCancelled(state);
        state.toolsCalled.push(intent.toolName);
        const result = await this.deps.dispatcher.dispatch(intent, state.ctx, state.sink);
        state.toolResults.push(result);
        state.conversation.push(toToolMessage(intent, result));
      }
    }
  }

  /** Consumes one turn's fragment stream; every fragment fetch has its own deadline. */
  private async consumeTurn(state: RunState): Promise<TurnOutcome> {
    const turnController = new AbortController();
    const abortTurn = () => turnController.abort(state.ctx.signal.reason);
    state.ctx.signal.addEventListener('abort', abortTurn, { once: true });

    const outcome: TurnOutcome = { text: '', intents: [] };
    const tools = this.deps.registry.toOpenAITools();
    try {
      let iterator: AsyncIterator<ReasoningFragment>;
      try {
        iterator = this.deps.reasoning
          .streamTurn(state.conversation, { signal: turnController.signal, tools })
          [Symbol.asyncIterator]();
      } catch (error) {
        throw upstreamFailure(error);
      }

      while (true) {
        let next: IteratorResult<ReasoningFragment>;
        try {
          next = await raceWithDeadline(iterator.next(), {
            timeoutMs: this.reasoningTimeoutMs,
            dependency: 'ReasoningBackend',
            signal: state.ctx.signal,
            onTimeout: () => turnController.abort('timeout'),
          });
        } catch (error) {
          if (error instanceof RequestCancelledError || error instanceof DependencyTimeoutError) {
            throw error;
          }
          throw upstreamFailure(error);
        }
        if (next.done) break;

        const fragment = next.value;
        switch (fragment.kind) {
          case 'text':
            if (!fragment.text) break;
            outcome.text += fragment.text;
            state.accumulated += fragment.text;
            state.sink.emit({ type: 'response_delta', delta: fragment.text, accumulated: state.accumulated });
            break;
          case 'reasoning':
            if (fragment.text) {
              state.sink.emit({ type: 'thinking', content: fragment.text });
            }
            break;
          case 'tool_call':
            outcome.intents.push({
              callId: fragment.callId || `call_${state.turns}_${outcome.intents.length}`,
              toolName: fragment.toolName,
              arguments: fragment.arguments,
              isDestructive: this.deps.registry.isDestructive(fragment.toolName),
              ...(fragment.argumentsError ? { argumentsError: fragment.argumentsError } : {}),
            });
            break;
        }
      }
    } finally {
      state.ctx.signal.removeEventListener('abort', abortTurn);
    }

    return outcome;
  }

  private finalize(state: RunState): void {
    this.throwIfCancelled(state);
    state.phase = 'Finalizing';
    state.sink.emit({
      type: 'done',
      finalOutput: state.accumulated || EMPTY_OUTPUT_FALLBACK,
      toolsCalled: [...state.toolsCalled],
      success: true,
    });
    state.phase = 'Done';
  }

  private fail(state: RunState, error: unknown): void {
    if (this.isCancelled(state)) {
      state.phase = 'Cancelled';
      return;
    }

    if (error instanceof StreamContractError) {
      // The terminal event is already out; nothing more may be emitted.
      state.phase = 'Error';
      logEvent(state.ctx.logger, 'error', 'stream_contract_violation', error.message);
      return;
    }

    const failure = this.toOrchestratorError(error);
    if (failure.recoverable) {
      logEvent(state.ctx.logger, 'warn', 'request_error', failure.message, {
        details: { errorKind: failure.kind, cause: errorMessage(error) },
      });
    } else {
      logEvent(state.ctx.logger, 'error', 'request_error', 'Unexpected orchestration error', {
        details: { errorKind: failure.kind, cause: errorMessage(error), stack: error instanceof Error ? error.stack : undefined },
      });
    }

    state.phase = 'Error';
    state.sink.emit({
      type: 'error',
      errorKind: failure.kind,
      message: failure.message,
      recoverable: failure.recoverable,
    });
  }

  private toOrchestratorError(error: unknown): OrchestratorError {
    if (error instanceof OrchestratorError) {
      return error;
    }
    if (error instanceof CircuitOpenError) {
      return new OrchestratorError(
        'DependencyUnavailable',
        'The reasoning service is temporarily unavailable. Please try again shortly.',
        true,
        { cause: error },
      );
    }
    if (error instanceof DependencyTimeoutError) {
      return new OrchestratorError('UpstreamFailure', 'The reasoning service timed out', true, { cause: error });
    }
    return new OrchestratorError('UpstreamFailure', 'An unexpected error occurred while processing the request', false, {
      cause: error,
    });
  }

  private isCancelled(state: RunState): boolean {
    return state.ctx.signal.aborted || state.sink.cancelled;
  }

  private throwIfCancelled(state: RunState): void {
    if (this.isCancelled(state)) {
      throw new RequestCancelledError(state.ctx.signal.reason);
    }
  }

  private terminalPhase(state: RunState): TerminalPhase {
    if (state.phase === 'Done' || state.phase === 'Error' || state.phase === 'Cancelled') {
      return state.phase;
    }
    return 'Cancelled';
  }

  private logOutcome(state: RunState, durationMs: number): void {
    const phase = this.terminalPhase(state);
    const details = { turns: state.turns, toolsCalled: state.toolsCalled };

    if (phase === 'Done') {
      this.deps.metrics?.trackRequestFinished('completed', durationMs);
      logEvent(state.ctx.logger, 'info', 'request_completed', 'Request completed', { durationMs, details });
    } else if (phase === 'Error') {
      this.deps.metrics?.trackRequestFinished('failed', durationMs);
      logEvent(state.ctx.logger, 'warn', 'request_failed', 'Request failed', { durationMs, details });
    } else {
      this.deps.metrics?.trackRequestFinished('cancelled', durationMs);
      logEvent(state.ctx.logger, 'info', 'request_cancelled', 'Request cancelled', { durationMs, details });
    }
  }
}

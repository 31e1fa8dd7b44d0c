// OpenAI-compatible Reasoning Backend
// Works against any chat-completions endpoint that streams tool calls (OpenAI, Gemini, DeepSeek, vLLM)

import OpenAI from 'openai';
import { errorMessage } from '../utils/errors.js';
import type { ProviderMessage, ProviderOptions, ReasoningBackend, ReasoningFragment, ToolCall } from './types.js';

type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;

export interface OpenAICompatibleOptions {
  baseURL: string;
  apiKey: string;
  model: string;
}

function formatMessage(message: ProviderMessage): ChatMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      if (message.tool_calls && message.tool_calls.length > 0) {
        return {
          role: 'assistant',
          content: message.content || null,
          tool_calls: message.tool_calls.map(tc => ({
            id: tc.id,
            type: 'function',
            function: { name: tc.name, arguments: tc.arguments },
          })),
        };
      }
      return { role: 'assistant', content: message.content };
    case 'tool':
      return { role: 'tool', tool_call_id: message.tool_call_id, content: message.content };
  }
}

/** Empty argument text means "no arguments"; anything else must be a JSON object. */
export function parseToolArguments(call: ToolCall): Record<string, unknown> {
  if (!call.arguments.trim()) {
    return {};
  }
  const parsed: unknown = JSON.parse(call.arguments);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Tool call "${call.name}" arguments are not a JSON object`);
  }
  return { ...parsed };
}

/**
 * Maps streamed completion chunks to fragments. Tool-call deltas are
 * accumulated by index and yielded once the stream ends.
 */
export async function* fragmentsFromChunks(
  chunks: AsyncIterable<OpenAI.Chat.ChatCompletionChunk>,
): AsyncGenerator<ReasoningFragment> {
  const accumulatedToolCalls: Map<number, ToolCall> = new Map();

  for await (const chunk of chunks) {
    const choice = chunk.choices[0];
    if (!choice) continue;
    const delta = choice.delta;

    // Reasoning content (DeepSeek R1, Gemini thinking) is not part of the typed delta
    if ('reasoning_content' in delta && typeof delta.reasoning_content === 'string' && delta.reasoning_content) {
      yield { kind: 'reasoning', text: delta.reasoning_content };
    }

    if (delta.content) {
      yield { kind: 'text', text: delta.content };
    }

    for (const toolCallDelta of delta.tool_calls ?? []) {
      const existing = accumulatedToolCalls.get(toolCallDelta.index) ?? { id: '', name: '', arguments: '' };
      if (toolCallDelta.id) existing.id = toolCallDelta.id;
      if (toolCallDelta.function?.name) existing.name = toolCallDelta.function.name;
      if (toolCallDelta.function?.arguments) existing.arguments += toolCallDelta.function.arguments;
      accumulatedToolCalls.set(toolCallDelta.index, existing);
    }
  }

  const ordered = Array.from(accumulatedToolCalls.entries()).sort(([a], [b]) => a - b);
  for (const [index, call] of ordered) {
    if (!call.name) continue;
    const callId = call.id || `call_${index}`;
    // A truncated or malformed call fails on its own; the rest of the turn still runs.
    let fragment: ReasoningFragment;
    try {
      fragment = { kind: 'tool_call', callId, toolName: call.name, arguments: parseToolArguments(call) };
    } catch (error) {
      fragment = { kind: 'tool_call', callId, toolName: call.name, arguments: {}, argumentsError: errorMessage(error) };
    }
    yield fragment;
  }
}

export class OpenAICompatibleBackend implements ReasoningBackend {
  readonly name = 'openai-compatible';
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAICompatibleOptions) {
    this.model = options.model;
    // One attempt per turn; no SDK retries.
    this.client = new OpenAI({
      baseURL: options.baseURL,
      apiKey: options.apiKey,
      maxRetries: 0,
    });
  }

  async *streamTurn(messages: ProviderMessage[], options: ProviderOptions): AsyncIterable<ReasoningFragment> {
    const stream = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: messages.map(formatMessage),
        stream: true,
        ...(options.tools && options.tools.length > 0 ? { tools: options.tools, tool_choice: 'auto' as const } : {}),
      },
      { signal: options.signal },
    );

    yield* fragmentsFromChunks(stream);
  }
}

// Reasoning Backend interface
// One call streams one turn: text, reasoning and tool-call intents, lazily

import type { OpenAIToolDef } from '../services/tools/registry.js';

export interface ToolCall {
  id: string;
  name: string;
  arguments: string; // JSON string
}

export type ProviderTool = OpenAIToolDef;

export type ProviderMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string; tool_calls?: ToolCall[] }
  | { role: 'tool'; content: string; tool_call_id: string; name?: string };

export interface ProviderOptions {
  signal: AbortSignal;
  tools?: ProviderTool[];
}

export type ReasoningFragment =
  | { kind: 'text'; text: string }
  | { kind: 'reasoning'; text: string }
  | {
      kind: 'tool_call';
      callId: string;
      toolName: string;
      arguments: Record<string, unknown>;
      /** Set when the streamed argument text did not parse; `arguments` is then empty. */
      argumentsError?: string;
    };

export interface ReasoningBackend {
  readonly name: string;
  readonly model: string;
  /** Fragments arrive in generation order; tool calls follow the text of their turn. */
  streamTurn(messages: ProviderMessage[], options: ProviderOptions): AsyncIterable<ReasoningFragment>;
}

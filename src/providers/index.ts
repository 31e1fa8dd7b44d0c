// Reasoning Backend factory

import { env, isReasoningConfigured } from '../env.js';
import { OpenAICompatibleBackend } from './openai-compatible.js';
import type { ReasoningBackend } from './types.js';

export function createReasoningBackend(): ReasoningBackend {
  if (!isReasoningConfigured()) {
    throw new Error('Reasoning Backend is not configured (set REASONING_API_KEY and REASONING_BASE_URL)');
  }
  return new OpenAICompatibleBackend({
    baseURL: env.REASONING_BASE_URL,
    apiKey: env.REASONING_API_KEY,
    model: env.REASONING_MODEL,
  });
}

export { OpenAICompatibleBackend, fragmentsFromChunks, parseToolArguments } from './openai-compatible.js';
export type {
  ProviderMessage,
  ProviderOptions,
  ProviderTool,
  ReasoningBackend,
  ReasoningFragment,
  ToolCall,
} from './types.js';

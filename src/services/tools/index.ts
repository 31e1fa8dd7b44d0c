// Tool System Initialization
// Discovers the Tool Backend's operations once on startup, then freezes the registry

import type { AppLogger } from '../../observability/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { CircuitBreaker } from '../resilience/circuit-breaker.js';
import { BUILTIN_TOOL_DESCRIPTORS } from './builtin.js';
import { ToolRegistry } from './registry.js';
import type { ToolBackend, ToolDescriptor } from './types.js';

export { ToolRegistry } from './registry.js';
export { ToolCallDispatcher, isConfirmed, DEFAULT_TOOL_CALL_TIMEOUT_MS } from './dispatcher.js';
export { BUILTIN_TOOL_DESCRIPTORS } from './builtin.js';
export { buildArgumentValidator } from './schema.js';
export type { DispatcherOptions } from './dispatcher.js';
export type { OpenAIToolDef } from './registry.js';
export type {
  ToolBackend,
  ToolCallIntent,
  ToolCallResult,
  ToolDescriptor,
  ToolInputSchema,
  ToolPayload,
} from './types.js';

export type ToolSource = 'discovery' | 'builtin';

export interface InitializeToolsOptions {
  logger: AppLogger;
  /** Omitted when discovery is disabled. */
  backend?: ToolBackend;
  /** Discovery goes through the Tool Backend breaker like any other call. */
  breaker?: CircuitBreaker;
}

export interface InitializedTools {
  registry: ToolRegistry;
  source: ToolSource;
}

async function discover(backend: ToolBackend, breaker?: CircuitBreaker): Promise<ToolDescriptor[]> {
  return breaker ? breaker.guard(() => backend.listTools()) : backend.listTools();
}

export async function initializeTools(options: InitializeToolsOptions): Promise<InitializedTools> {
  const { logger, backend, breaker } = options;
  const registry = new ToolRegistry(logger);
  let descriptors: readonly ToolDescriptor[] = BUILTIN_TOOL_DESCRIPTORS;
  let source: ToolSource = 'builtin';

  if (backend) {
    try {
      const discovered = await discover(backend, breaker);
      if (discovered.length > 0) {
        descriptors = discovered;
        source = 'discovery';
      } else {
        logger.warn('Tool Backend advertised no tools, using built-in descriptors');
      }
    } catch (error) {
      logger.warn({ err: errorMessage(error) }, 'Tool discovery failed, using built-in descriptors');
    }
  }

  for (const descriptor of descriptors) {
    registry.register(descriptor);
  }
  registry.freeze();

  const tools = registry.getAll();
  logger.info(
    {
      source,
      tools: tools.map(t => t.name),
      destructive: tools.filter(t => t.destructive).map(t => t.name),
    },
    `Tool system initialized with ${tools.length} tool(s)`,
  );

  return { registry, source };
}

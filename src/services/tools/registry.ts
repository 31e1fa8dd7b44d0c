// Tool Registry - read-only view of the Tool Backend's operations
// Populated once at startup from discovery, then frozen

import type { z } from 'zod';
import type { AppLogger } from '../../observability/logger.js';
import { buildArgumentValidator } from './schema.js';
import type { JsonSchemaProperty, ToolDescriptor } from './types.js';

export interface OpenAIToolDef {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, JsonSchemaProperty>;
      required: string[];
    };
  };
}

interface RegisteredTool {
  descriptor: ToolDescriptor;
  validator: z.ZodType<Record<string, unknown>>;
}

export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();
  private frozen = false;

  constructor(private readonly logger?: AppLogger) {}

  register(descriptor: ToolDescriptor): void {
    if (this.frozen) {
      throw new Error(`Tool registry is frozen; cannot register "${descriptor.name}"`);
    }
    if (this.tools.has(descriptor.name)) {
      this.logger?.warn({ toolName: descriptor.name }, 'Tool already registered, overwriting');
    }
    this.tools.set(descriptor.name, {
      descriptor: Object.freeze({ ...descriptor }),
      validator: buildArgumentValidator(descriptor.inputSchema),
    });
  }

  /** Ends the startup phase; lookups are the only operation afterwards. */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name)?.descriptor;
  }

  getValidator(name: string): z.ZodType<Record<string, unknown>> | undefined {
    return this.tools.get(name)?.validator;
  }

  getAll(): ToolDescriptor[] {
    return Array.from(this.tools.values(), tool => tool.descriptor);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  isDestructive(name: string): boolean {
    return this.tools.get(name)?.descriptor.destructive ?? false;
  }

  toOpenAITools(): OpenAIToolDef[] {
    return this.getAll().map(tool => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: {
          type: 'object',
          properties: tool.inputSchema.properties,
          required: tool.inputSchema.required ?? [],
        },
      },
    }));
  }
}

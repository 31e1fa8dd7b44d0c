// Tool Backend over the Model Context Protocol
// Discovery via tools/list; every operation is one tools/call round trip

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ErrorCode as McpErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ToolBackendError, errorMessage } from '../../utils/errors.js';
import type {
  JsonSchemaProperty,
  ToolBackend,
  ToolCallOptions,
  ToolDescriptor,
  ToolPayload,
} from '../tools/types.js';

const JsonSchemaPropertySchema: z.ZodType<JsonSchemaProperty> = z.lazy(() =>
  z.object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
    enum: z.array(z.unknown()).optional(),
    const: z.unknown().optional(),
    minLength: z.number().optional(),
    maxLength: z.number().optional(),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    items: JsonSchemaPropertySchema.optional(),
    default: z.unknown().optional(),
  }),
);

const DiscoveredToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: z.object({
    properties: z.record(JsonSchemaPropertySchema).optional(),
    required: z.array(z.string()).optional(),
    additionalProperties: z.union([z.boolean(), z.record(z.unknown())]).optional(),
  }),
  annotations: z.object({ destructiveHint: z.boolean().optional() }).passthrough().optional(),
});

const CallOutcomeSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
  structuredContent: z.record(z.unknown()).optional(),
  isError: z.boolean().optional(),
});

type DiscoveredTool = z.infer<typeof DiscoveredToolSchema>;

/** Destructive when annotated so, or when the schema demands a confirmation argument. */
export function toDescriptor(tool: DiscoveredTool): ToolDescriptor {
  const required = tool.inputSchema.required ?? [];
  return {
    name: tool.name,
    description: tool.description ?? '',
    inputSchema: {
      type: 'object',
      properties: tool.inputSchema.properties ?? {},
      required,
      ...(tool.inputSchema.additionalProperties === false ? { additionalProperties: false } : {}),
    },
    destructive: tool.annotations?.destructiveHint === true || required.includes('confirmation'),
  };
}

const NOT_FOUND_PATTERN = /not found|unknown tool|does not exist|no such/i;
const INVALID_ARGUMENTS_PATTERN = /invalid|validation|required|must be/i;

function classifyDomainError(message: string): ToolBackendError | null {
  if (NOT_FOUND_PATTERN.test(message)) return new ToolBackendError('NotFound', message);
  if (INVALID_ARGUMENTS_PATTERN.test(message)) return new ToolBackendError('InvalidArguments', message);
  return null;
}

/** JSON text content becomes structured data; other text is wrapped as `{ text }`. */
export function extractPayload(outcome: z.infer<typeof CallOutcomeSchema>): ToolPayload {
  if (outcome.structuredContent) {
    return outcome.structuredContent;
  }

  const text = outcome.content
    .map(part => part.text)
    .filter((part): part is string => typeof part === 'string')
    .join('\n');
  if (!text) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(text);
    if (Array.isArray(parsed)) return parsed;
    if (parsed !== null && typeof parsed === 'object') return { ...parsed };
    return { value: parsed };
  } catch {
    return { text };
  }
}

export interface McpToolBackendOptions {
  /** Called once per connection attempt; a transport is never reused after it closed or failed. */
  createTransport: () => Transport;
  clientName?: string;
  clientVersion?: string;
}

export class McpToolBackend implements ToolBackend {
  readonly name = 'mcp';
  private client: Client | null = null;
  private connecting?: Promise<Client>;

  constructor(private readonly options: McpToolBackendOptions) {}

  async listTools(): Promise<ToolDescriptor[]> {
    const client = await this.ensureConnected();

    const descriptors: ToolDescriptor[] = [];
    let cursor: string | undefined;
    do {
      const page = await client.listTools(cursor ? { cursor } : undefined);
      for (const raw of page.tools) {
        const parsed = DiscoveredToolSchema.safeParse(raw);
        if (parsed.success) {
          descriptors.push(toDescriptor(parsed.data));
        }
      }
      cursor = page.nextCursor;
    } while (cursor);

    return descriptors;
  }

  async callTool(name: string, args: Record<string, unknown>, options: ToolCallOptions): Promise<ToolPayload> {
    const client = await this.ensureConnected();

    let raw: unknown;
    try {
      raw = await client.callTool({ name, arguments: args }, undefined, { signal: options.signal });
    } catch (error) {
      if (error instanceof McpError) {
        if (error.code === McpErrorCode.MethodNotFound) {
          throw new ToolBackendError('NotFound', error.message);
        }
        if (error.code === McpErrorCode.InvalidParams) {
          throw classifyDomainError(error.message) ?? new ToolBackendError('InvalidArguments', error.message);
        }
      }
      throw error;
    }

    const outcome = CallOutcomeSchema.safeParse(raw);
    if (!outcome.success) {
      throw new Error(`Malformed tools/call result for "${name}"`);
    }

    if (outcome.data.isError) {
      const payload = extractPayload(outcome.data);
      const message = !Array.isArray(payload) && typeof payload.text === 'string'
        ? payload.text
        : `Tool "${name}" reported an error`;
      throw classifyDomainError(message) ?? new Error(message);
    }

    return extractPayload(outcome.data);
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    await client?.close();
  }

  private ensureConnected(): Promise<Client> {
    if (this.client) {
      return Promise.resolve(this.client);
    }
    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = undefined;
      });
    }
    return this.connecting;
  }

  private async connect(): Promise<Client> {
    const client = new Client({
      name: this.options.clientName ?? 'tool-stream-orchestrator',
      version: this.options.clientVersion ?? '1.0.0',
    });
    // A closed connection (server restart, stdio child exit) is redialled on the next call.
    client.onclose = () => {
      if (this.client === client) {
        this.client = null;
      }
    };

    try {
      await client.connect(this.options.createTransport());
    } catch (error) {
      throw new Error(`Failed to connect to Tool Backend: ${errorMessage(error)}`, { cause: error });
    }

    this.client = client;
    return client;
  }
}

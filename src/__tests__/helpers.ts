// Shared test doubles: captured logs, an in-memory stream writer and scripted backends

import { vi } from 'vitest';
import { createLogger, type AppLogger } from '../observability/logger.js';
import type { ProviderMessage, ProviderOptions, ReasoningBackend, ReasoningFragment } from '../providers/types.js';
import { admit } from '../services/admission.js';
import { tag, type RequestContext } from '../services/correlation.js';
import { openStream, type StreamSink, type StreamWriter } from '../services/streaming/index.js';
import type { ToolBackend, ToolCallOptions, ToolDescriptor, ToolPayload } from '../services/tools/types.js';
import { BUILTIN_TOOL_DESCRIPTORS } from '../services/tools/builtin.js';

export type LogRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A real pino logger writing JSON lines into memory. */
export function captureLogs(): { logger: AppLogger; records: () => LogRecord[] } {
  const lines: string[] = [];
  const logger = createLogger({
    write(line: string) {
      lines.push(line);
    },
  });
  return {
    logger,
    records: () =>
      lines.map(line => {
        const parsed: unknown = JSON.parse(line);
        return isRecord(parsed) ? parsed : {};
      }),
  };
}

export interface ParsedFrame {
  event: string;
  data: Record<string, unknown>;
}

/** Splits SSE text into frames; comment frames (heartbeats) are skipped. */
export function parseSseFrames(text: string): ParsedFrame[] {
  return text
    .split('\n\n')
    .filter(block => block.startsWith('event: '))
    .map(block => {
      const [eventLine = '', dataLine = ''] = block.split('\n');
      const parsed: unknown = JSON.parse(dataLine.slice('data: '.length));
      return { event: eventLine.slice('event: '.length), data: isRecord(parsed) ? parsed : {} };
    });
}

export class MemoryWriter implements StreamWriter {
  readonly frames: string[] = [];
  ended = false;
  /** When set, write() waits on it before accepting the frame. */
  gate: Promise<void> | null = null;
  failWith: Error | null = null;
  private closeListeners: Array<() => void> = [];

  async write(frame: string): Promise<void> {
    if (this.gate) await this.gate;
    if (this.failWith) throw this.failWith;
    this.frames.push(frame);
  }

  end(): void {
    this.ended = true;
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  /** Simulates the client going away. */
  disconnect(): void {
    for (const listener of this.closeListeners) listener();
  }

  get text(): string {
    return this.frames.join('');
  }

  parsed(): ParsedFrame[] {
    return parseSseFrames(this.text);
  }
}

export interface TestRequest {
  ctx: RequestContext;
  sink: StreamSink;
  writer: MemoryWriter;
  controller: AbortController;
}

export function openTestRequest(
  input: string,
  options: { logger: AppLogger; requestId?: string; heartbeatMs?: number; queueCapacity?: number },
): TestRequest {
  const controller = new AbortController();
  const ctx = tag(admit(input), {
    logger: options.logger,
    signal: controller.signal,
    clientRequestId: options.requestId ?? 'req_test',
  });
  const writer = new MemoryWriter();
  const sink = openStream(ctx, writer, {
    controller,
    heartbeatMs: options.heartbeatMs ?? 60_000,
    queueCapacity: options.queueCapacity ?? 256,
  });
  return { ctx, sink, writer, controller };
}

export type ToolHandler = (args: Record<string, unknown>, options: ToolCallOptions) => Promise<ToolPayload>;

/** In-process Tool Backend over the built-in todo descriptors. */
export class FakeToolBackend implements ToolBackend {
  readonly name = 'fake';
  readonly callTool = vi.fn(
    async (name: string, args: Record<string, unknown>, options: ToolCallOptions): Promise<ToolPayload> => {
      const handler = this.handlers.get(name);
      if (!handler) throw new Error(`no handler for ${name}`);
      return handler(args, options);
    },
  );
  readonly listTools = vi.fn(async (): Promise<ToolDescriptor[]> => [...this.descriptors]);
  private readonly handlers = new Map<string, ToolHandler>();

  constructor(private readonly descriptors: readonly ToolDescriptor[] = BUILTIN_TOOL_DESCRIPTORS) {}

  on(name: string, handler: ToolHandler): this {
    this.handlers.set(name, handler);
    return this;
  }

  async close(): Promise<void> {}
}

export type TurnScript = ReasoningFragment[] | ((messages: ProviderMessage[], options: ProviderOptions) => AsyncIterable<ReasoningFragment>);

/** Plays back one script per turn and records the conversation each turn saw. */
export class ScriptedReasoning implements ReasoningBackend {
  readonly name = 'scripted';
  readonly model = 'scripted-model';
  readonly conversations: ProviderMessage[][] = [];
  private turn = 0;

  constructor(private readonly turns: TurnScript[]) {}

  streamTurn(messages: ProviderMessage[], options: ProviderOptions): AsyncIterable<ReasoningFragment> {
    this.conversations.push(messages.map(message => ({ ...message })));
    const script = this.turns[this.turn++];
    if (script === undefined) {
      throw new Error(`No script for turn ${this.turn}`);
    }
    if (typeof script === 'function') {
      return script(messages, options);
    }
    return (async function* () {
      for (const fragment of script) {
        yield fragment;
      }
    })();
  }
}

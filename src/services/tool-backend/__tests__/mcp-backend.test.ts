import { afterEach, describe, expect, it, vi } from 'vitest';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import { McpToolBackend, extractPayload } from '../mcp-backend.js';
import { resolveTransportConfig, transportFactory } from '../transport.js';
import { ToolBackendError } from '../../../utils/errors.js';

interface Todo {
  id: number;
  title: string;
  status: string;
}

function text(value: unknown) {
  return { content: [{ type: 'text' as const, text: typeof value === 'string' ? value : JSON.stringify(value) }] };
}

async function startTodoServer() {
  const todos: Todo[] = [];
  const server = new Server({ name: 'todo-test', version: '1.0.0' }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'create',
        description: 'Create a todo',
        inputSchema: {
          type: 'object' as const,
          properties: { title: { type: 'string', minLength: 1, maxLength: 200 } },
          required: ['title'],
        },
      },
      { name: 'list', description: 'List todos', inputSchema: { type: 'object' as const, properties: {} } },
      {
        name: 'purge',
        description: 'Remove everything',
        inputSchema: { type: 'object' as const, properties: {} },
        annotations: { destructiveHint: true },
      },
      {
        name: 'delete',
        description: 'Delete a todo',
        inputSchema: {
          type: 'object' as const,
          properties: { id: { type: 'integer' }, confirmation: { type: 'boolean' } },
          required: ['id', 'confirmation'],
        },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async request => {
    const args = request.params.arguments ?? {};
    switch (request.params.name) {
      case 'create': {
        const todo = { id: todos.length + 1, title: String(args.title), status: 'active' };
        todos.push(todo);
        return text(todo);
      }
      case 'list':
        return text(todos);
      case 'stats':
        return { content: [], structuredContent: { total: todos.length } };
      case 'update':
        return { ...text(`Todo ${String(args.id)} not found`), isError: true };
      case 'rename':
        return { ...text('Invalid title: must be non-empty'), isError: true };
      case 'flaky':
        return { ...text('database is locked'), isError: true };
      default:
        throw new McpError(ErrorCode.InvalidParams, `Unknown tool: ${request.params.name}`);
    }
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  return { server, clientTransport };
}

/** A Tool Backend that is not listening. */
class RefusingTransport implements Transport {
  async start(): Promise<void> {
    throw new Error('connect ECONNREFUSED 127.0.0.1:8001');
  }

  async send(): Promise<void> {
    throw new Error('not connected');
  }

  async close(): Promise<void> {}
}

function transportQueue(transports: Transport[]) {
  return vi.fn((): Transport => {
    const next = transports.shift();
    if (!next) throw new Error('no transport left');
    return next;
  });
}

const signal = new AbortController().signal;

describe('McpToolBackend', () => {
  let cleanup: Array<() => Promise<void>> = [];

  afterEach(async () => {
    for (const fn of cleanup) await fn();
    cleanup = [];
  });

  async function connect() {
    const { server, clientTransport } = await startTodoServer();
    const backend = new McpToolBackend({ createTransport: () => clientTransport });
    cleanup.push(() => backend.close(), () => server.close());
    return { server, backend };
  }

  it('should discover tools and mark destructive ones', async () => {
    const { backend } = await connect();

    const tools = await backend.listTools();

    expect(tools.map(t => [t.name, t.destructive])).toEqual([
      ['create', false],
      ['list', false],
      ['purge', true],
      ['delete', true],
    ]);
    expect(tools[0].inputSchema).toEqual({
      type: 'object',
      properties: { title: { type: 'string', minLength: 1, maxLength: 200 } },
      required: ['title'],
    });
  });

  it('should parse JSON text content into the payload', async () => {
    const { backend } = await connect();

    const created = await backend.callTool('create', { title: 'buy eggs' }, { signal });
    const listed = await backend.callTool('list', {}, { signal });

    expect(created).toEqual({ id: 1, title: 'buy eggs', status: 'active' });
    expect(listed).toEqual([{ id: 1, title: 'buy eggs', status: 'active' }]);
  });

  it('should prefer structured content', async () => {
    const { backend } = await connect();

    expect(await backend.callTool('stats', {}, { signal })).toEqual({ total: 0 });
  });

  it('should map a not-found tool error to ToolBackendError NotFound', async () => {
    const { backend } = await connect();

    const error = await backend.callTool('update', { id: 99 }, { signal }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolBackendError);
    expect(error).toMatchObject({ kind: 'NotFound', message: 'Todo 99 not found' });
  });

  it('should map a validation tool error to ToolBackendError InvalidArguments', async () => {
    const { backend } = await connect();

    const error = await backend.callTool('rename', { title: '' }, { signal }).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: 'InvalidArguments', message: 'Invalid title: must be non-empty' });
  });

  it('should surface other tool errors as plain failures', async () => {
    const { backend } = await connect();

    const error = await backend.callTool('flaky', {}, { signal }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(Error);
    expect(error).not.toBeInstanceOf(ToolBackendError);
    expect(error).toMatchObject({ message: 'database is locked' });
  });

  it('should map an unknown tool protocol error to NotFound', async () => {
    const { backend } = await connect();

    const error = await backend.callTool('archive', {}, { signal }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolBackendError);
    expect(error).toMatchObject({ kind: 'NotFound' });
  });
});

describe('McpToolBackend reconnection', () => {
  let cleanup: Array<() => Promise<void>> = [];

  afterEach(async () => {
    for (const fn of cleanup) await fn();
    cleanup = [];
  });

  it('should dial a fresh transport after a failed connection attempt', async () => {
    const { server, clientTransport } = await startTodoServer();
    const createTransport = transportQueue([new RefusingTransport(), clientTransport]);
    const backend = new McpToolBackend({ createTransport });
    cleanup.push(() => backend.close(), () => server.close());

    await expect(backend.callTool('list', {}, { signal })).rejects.toThrow(
      'Failed to connect to Tool Backend: connect ECONNREFUSED 127.0.0.1:8001',
    );
    const created = await backend.callTool('create', { title: 'buy eggs' }, { signal });

    expect(created).toEqual({ id: 1, title: 'buy eggs', status: 'active' });
    expect(createTransport).toHaveBeenCalledTimes(2);
  });

  it('should reconnect after the connection closes', async () => {
    const first = await startTodoServer();
    const second = await startTodoServer();
    const createTransport = transportQueue([first.clientTransport, second.clientTransport]);
    const backend = new McpToolBackend({ createTransport });
    cleanup.push(() => backend.close(), () => second.server.close());

    await backend.callTool('create', { title: 'on the first server' }, { signal });
    await first.server.close();
    const listed = await backend.callTool('list', {}, { signal });

    expect(listed).toEqual([]);
    expect(createTransport).toHaveBeenCalledTimes(2);
  });

  it('should share one connection attempt between concurrent calls', async () => {
    const { server, clientTransport } = await startTodoServer();
    const createTransport = transportQueue([clientTransport]);
    const backend = new McpToolBackend({ createTransport });
    cleanup.push(() => backend.close(), () => server.close());

    await Promise.all([backend.callTool('list', {}, { signal }), backend.callTool('list', {}, { signal })]);

    expect(createTransport).toHaveBeenCalledTimes(1);
  });
});

describe('transportFactory', () => {
  it('should reject a malformed URL up front', () => {
    expect(() => transportFactory({ type: 'streamableHttp', url: 'not a url' })).toThrow(
      'Invalid Tool Backend URL "not a url"',
    );
  });

  it('should reject a non-http URL up front', () => {
    expect(() => transportFactory({ type: 'streamableHttp', url: 'ftp://127.0.0.1/mcp' })).toThrow(
      'Tool Backend URL must use http or https, got "ftp:"',
    );
  });

  it('should build a new transport on every call', () => {
    const create = transportFactory({ type: 'streamableHttp', url: 'http://127.0.0.1:8001/mcp' });

    expect(create()).not.toBe(create());
  });
});

describe('extractPayload', () => {
  it('should wrap non-JSON text', () => {
    expect(extractPayload({ content: [{ type: 'text', text: 'done' }] })).toEqual({ text: 'done' });
  });

  it('should wrap JSON scalars', () => {
    expect(extractPayload({ content: [{ type: 'text', text: '42' }] })).toEqual({ value: 42 });
  });

  it('should return an empty object for empty content', () => {
    expect(extractPayload({ content: [] })).toEqual({});
  });
});

describe('resolveTransportConfig', () => {
  it('should prefer the URL over a command', () => {
    expect(resolveTransportConfig({ url: 'http://127.0.0.1:8001/mcp', command: 'todo-server', args: [] })).toEqual({
      type: 'streamableHttp',
      url: 'http://127.0.0.1:8001/mcp',
    });
  });

  it('should fall back to stdio with arguments', () => {
    expect(resolveTransportConfig({ url: '', command: 'node', args: ['todo-server.js', '--stdio'] })).toEqual({
      type: 'stdio',
      command: 'node',
      args: ['todo-server.js', '--stdio'],
    });
  });

  it('should return null when nothing is configured', () => {
    expect(resolveTransportConfig({ url: '', command: '', args: [] })).toBeNull();
  });
});

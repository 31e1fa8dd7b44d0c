import { describe, it, expect } from 'vitest';
import { ToolRegistry } from '../registry.js';
import { BUILTIN_TOOL_DESCRIPTORS } from '../builtin.js';
import { initializeTools } from '../index.js';
import type { ToolDescriptor } from '../types.js';
import { CircuitBreaker } from '../../resilience/circuit-breaker.js';
import { FakeToolBackend, captureLogs } from '../../../__tests__/helpers.js';

const echoTool: ToolDescriptor = {
  name: 'echo',
  description: 'Echo the input',
  inputSchema: {
    type: 'object',
    properties: { input: { type: 'string', description: 'Text to echo' } },
    required: ['input'],
  },
  destructive: false,
};

describe('Tool Registry', () => {
  it('should register and retrieve tools', () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);

    expect(registry.has('echo')).toBe(true);
    expect(registry.get('echo')).toEqual(echoTool);
    expect(registry.get('missing')).toBeUndefined();
    expect(registry.getAll().map(t => t.name)).toEqual(['echo']);
  });

  it('should report destructiveness and default unknown tools to non-destructive', () => {
    const registry = new ToolRegistry();
    for (const descriptor of BUILTIN_TOOL_DESCRIPTORS) registry.register(descriptor);

    expect(registry.isDestructive('delete')).toBe(true);
    expect(registry.isDestructive('create')).toBe(false);
    expect(registry.isDestructive('missing')).toBe(false);
  });

  it('should refuse registration once frozen', () => {
    const registry = new ToolRegistry();
    registry.freeze();

    expect(registry.isFrozen).toBe(true);
    expect(() => registry.register(echoTool)).toThrow('Tool registry is frozen; cannot register "echo"');
  });

  it('should warn when a tool is registered twice', () => {
    const { logger, records } = captureLogs();
    const registry = new ToolRegistry(logger);
    registry.register(echoTool);
    registry.register({ ...echoTool, description: 'Second' });

    expect(registry.get('echo')?.description).toBe('Second');
    expect(records().map(r => r.msg)).toEqual(['Tool already registered, overwriting']);
  });

  it('should convert tools to OpenAI format', () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);

    expect(registry.toOpenAITools()).toEqual([
      {
        type: 'function',
        function: {
          name: 'echo',
          description: 'Echo the input',
          parameters: {
            type: 'object',
            properties: { input: { type: 'string', description: 'Text to echo' } },
            required: ['input'],
          },
        },
      },
    ]);
  });

  it('should validate arguments against the descriptor schema', () => {
    const registry = new ToolRegistry();
    for (const descriptor of BUILTIN_TOOL_DESCRIPTORS) registry.register(descriptor);
    const validator = registry.getValidator('update');

    expect(validator?.safeParse({ id: 3, status: 'completed' }).success).toBe(true);
    expect(validator?.safeParse({ id: 3, status: 'done' }).success).toBe(false);
    expect(validator?.safeParse({ id: 3.5 }).success).toBe(false);
    expect(validator?.safeParse({ id: 3, title: null }).success).toBe(true);
  });
});

describe('initializeTools', () => {
  it('should register the discovered tools and freeze the registry', async () => {
    const { logger } = captureLogs();
    const backend = new FakeToolBackend([echoTool]);

    const { registry, source } = await initializeTools({ logger, backend });

    expect(source).toBe('discovery');
    expect(registry.getAll().map(t => t.name)).toEqual(['echo']);
    expect(registry.isFrozen).toBe(true);
  });

  it('should fall back to the built-in descriptors when discovery fails', async () => {
    const { logger, records } = captureLogs();
    const backend = new FakeToolBackend();
    backend.listTools.mockRejectedValueOnce(new Error('connection refused'));
    const breaker = new CircuitBreaker('ToolBackend', { failureThreshold: 5, recoveryTimeoutMs: 1000, probeQuota: 1 }, { logger });

    const { registry, source } = await initializeTools({ logger, backend, breaker });

    expect(source).toBe('builtin');
    expect(registry.getAll().map(t => t.name)).toEqual(['create', 'list', 'update', 'delete']);
    expect(breaker.snapshot().consecutiveFailures).toBe(1);
    expect(records().some(r => r.msg === 'Tool discovery failed, using built-in descriptors')).toBe(true);
  });

  it('should use the built-in descriptors when discovery is disabled', async () => {
    const { logger } = captureLogs();

    const { registry, source } = await initializeTools({ logger });

    expect(source).toBe('builtin');
    expect(registry.getAll()).toEqual(BUILTIN_TOOL_DESCRIPTORS);
    expect(registry.isDestructive('delete')).toBe(true);
  });
});

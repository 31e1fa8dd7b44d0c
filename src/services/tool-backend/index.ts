export { McpToolBackend, extractPayload, toDescriptor } from './mcp-backend.js';
export type { McpToolBackendOptions } from './mcp-backend.js';
export { createTransport, resolveTransportConfig, transportFactory } from './transport.js';
export type { ToolBackendTransportConfig } from './transport.js';
export { UnconfiguredToolBackend } from './unconfigured.js';

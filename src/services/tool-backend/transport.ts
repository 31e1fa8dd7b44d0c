// MCP transport factory
// Streamable HTTP for a remote Tool Backend, stdio for one spawned as a child process

import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

export type ToolBackendTransportConfig =
  | { type: 'streamableHttp'; url: string }
  | { type: 'stdio'; command: string; args?: string[]; cwd?: string };

function parseHttpUrl(value: string): URL {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`Invalid Tool Backend URL "${value}"`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Tool Backend URL must use http or https, got "${url.protocol}"`);
  }
  return url;
}

function assertCommand(command: string): void {
  if (!command) {
    throw new Error('stdio Tool Backend requires a command');
  }
}

export function createTransport(config: ToolBackendTransportConfig): Transport {
  switch (config.type) {
    case 'streamableHttp':
      return new StreamableHTTPClientTransport(parseHttpUrl(config.url));
    case 'stdio':
      assertCommand(config.command);
      return new StdioClientTransport({
        command: config.command,
        args: config.args,
        cwd: config.cwd,
        stderr: 'inherit',
      });
    default: {
      const exhaustive: never = config;
      return exhaustive;
    }
  }
}

/**
 * Validates the configuration once, then builds a fresh transport per
 * connection attempt. A transport cannot be started twice.
 */
export function transportFactory(config: ToolBackendTransportConfig): () => Transport {
  if (config.type === 'streamableHttp') {
    parseHttpUrl(config.url);
  } else {
    assertCommand(config.command);
  }
  return () => createTransport(config);
}

/** Streamable HTTP wins when both a URL and a command are configured. */
export function resolveTransportConfig(settings: {
  url: string;
  command: string;
  args: string[];
}): ToolBackendTransportConfig | null {
  if (settings.url) {
    return { type: 'streamableHttp', url: settings.url };
  }
  if (settings.command) {
    return { type: 'stdio', command: settings.command, args: settings.args };
  }
  return null;
}

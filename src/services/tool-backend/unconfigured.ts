// Stand-in when no Tool Backend is configured
// Calls fail as transport errors, so the breaker and health report the outage

import type { ToolBackend, ToolDescriptor, ToolPayload } from '../tools/types.js';

export class UnconfiguredToolBackend implements ToolBackend {
  readonly name = 'unconfigured';

  async listTools(): Promise<ToolDescriptor[]> {
    throw new Error('Tool Backend is not configured');
  }

  async callTool(name: string): Promise<ToolPayload> {
    throw new Error(`Tool Backend is not configured; cannot call "${name}"`);
  }

  async close(): Promise<void> {}
}

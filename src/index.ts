// Tool stream orchestrator
// Port: 8000 (localhost by default)

// Load environment variables from .env file
import 'dotenv/config';

import { buildApp } from './app.js';
import { describeConfiguration, env, getConfigWarnings, isToolBackendConfigured } from './env.js';
import { buildLoggerOptions } from './observability/logger.js';
import { createReasoningBackend } from './providers/index.js';
import {
  McpToolBackend,
  UnconfiguredToolBackend,
  resolveTransportConfig,
  transportFactory,
} from './services/tool-backend/index.js';
import type { ToolBackend } from './services/tools/index.js';

function createToolBackend(): ToolBackend {
  const config = resolveTransportConfig({
    url: env.TOOL_BACKEND_URL,
    command: env.TOOL_BACKEND_COMMAND,
    args: env.TOOL_BACKEND_ARGS,
  });
  if (!config) {
    return new UnconfiguredToolBackend();
  }
  return new McpToolBackend({ createTransport: transportFactory(config) });
}

const toolBackend = createToolBackend();

const { server } = await buildApp({
  fastify: { logger: buildLoggerOptions() },
  reasoning: createReasoningBackend(),
  toolBackend,
  discoverTools: isToolBackendConfigured(),
  settings: {
    breakers: {
      ToolBackend: {
        failureThreshold: env.CB_TOOL_FAILURE_THRESHOLD,
        recoveryTimeoutMs: env.CB_TOOL_RECOVERY_TIMEOUT_MS,
        probeQuota: env.CB_TOOL_PROBE_QUOTA,
      },
      ReasoningBackend: {
        failureThreshold: env.CB_REASONING_FAILURE_THRESHOLD,
        recoveryTimeoutMs: env.CB_REASONING_RECOVERY_TIMEOUT_MS,
        probeQuota: env.CB_REASONING_PROBE_QUOTA,
      },
    },
    toolCallTimeoutMs: env.TOOL_CALL_TIMEOUT_MS,
    orchestrator: {
      reasoningTimeoutMs: env.REASONING_TIMEOUT_MS,
      maxTurns: env.MAX_REASONING_TURNS,
    },
    maxInputLength: env.MAX_INPUT_LENGTH,
    heartbeatMs: env.STREAM_HEARTBEAT_MS,
    queueCapacity: env.STREAM_QUEUE_CAPACITY,
    corsOrigins: env.CORS_ORIGINS,
  },
});

for (const warning of getConfigWarnings()) {
  server.log.warn(warning);
}
if (!isToolBackendConfigured()) {
  server.log.warn('No Tool Backend configured (TOOL_BACKEND_URL or TOOL_BACKEND_COMMAND); tool calls will fail');
}

server.addHook('onClose', async () => {
  await toolBackend.close();
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    server.log.info({ signal }, 'Shutting down');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        server.log.error(err);
        process.exit(1);
      },
    );
  });
}

// Start server
try {
  await server.listen({ port: env.PORT, host: env.HOST });
  server.log.info(describeConfiguration(), 'Configuration');
  server.log.info(`Health: http://${env.HOST}:${env.PORT}/v1/health`);
} catch (err) {
  server.log.error(err);
  process.exit(1);
}

// Environment configuration for the orchestrator
// Loads dependency endpoints, breaker tuning and stream settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

const configWarnings: string[] = [];

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    configWarnings.push(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    configWarnings.push(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

const splitList = (value: string | undefined) =>
  (value || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8000),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: splitList(process.env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000'),

  // Reasoning Backend (OpenAI-compatible chat completions)
  REASONING_BASE_URL: strEnv(
    process.env.REASONING_BASE_URL,
    'https://generativelanguage.googleapis.com/v1beta/openai/',
  ),
  REASONING_API_KEY: strEnv(process.env.REASONING_API_KEY),
  REASONING_MODEL: strEnv(process.env.REASONING_MODEL, 'gemini-2.5-flash'),
  REASONING_TIMEOUT_MS: parsePositiveInt(process.env.REASONING_TIMEOUT_MS, 30000, 'REASONING_TIMEOUT_MS'),
  MAX_REASONING_TURNS: parsePositiveInt(process.env.MAX_REASONING_TURNS, 8, 'MAX_REASONING_TURNS'),

  // Tool Backend (MCP server)
  TOOL_BACKEND_URL: strEnv(process.env.TOOL_BACKEND_URL),
  TOOL_BACKEND_COMMAND: strEnv(process.env.TOOL_BACKEND_COMMAND),
  TOOL_BACKEND_ARGS: splitList(process.env.TOOL_BACKEND_ARGS),
  TOOL_CALL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_CALL_TIMEOUT_MS, 30000, 'TOOL_CALL_TIMEOUT_MS'),

  // Circuit breakers
  CB_TOOL_FAILURE_THRESHOLD: parsePositiveInt(process.env.CB_TOOL_FAILURE_THRESHOLD, 5, 'CB_TOOL_FAILURE_THRESHOLD'),
  CB_TOOL_RECOVERY_TIMEOUT_MS: parsePositiveInt(
    process.env.CB_TOOL_RECOVERY_TIMEOUT_MS,
    30000,
    'CB_TOOL_RECOVERY_TIMEOUT_MS',
  ),
  CB_TOOL_PROBE_QUOTA: parsePositiveInt(process.env.CB_TOOL_PROBE_QUOTA, 3, 'CB_TOOL_PROBE_QUOTA'),
  CB_REASONING_FAILURE_THRESHOLD: parsePositiveInt(
    process.env.CB_REASONING_FAILURE_THRESHOLD,
    3,
    'CB_REASONING_FAILURE_THRESHOLD',
  ),
  CB_REASONING_RECOVERY_TIMEOUT_MS: parsePositiveInt(
    process.env.CB_REASONING_RECOVERY_TIMEOUT_MS,
    60000,
    'CB_REASONING_RECOVERY_TIMEOUT_MS',
  ),
  CB_REASONING_PROBE_QUOTA: parsePositiveInt(process.env.CB_REASONING_PROBE_QUOTA, 2, 'CB_REASONING_PROBE_QUOTA'),

  // Admission and streaming
  MAX_INPUT_LENGTH: parsePositiveInt(process.env.MAX_INPUT_LENGTH, 5000, 'MAX_INPUT_LENGTH'),
  STREAM_HEARTBEAT_MS: parsePositiveInt(process.env.STREAM_HEARTBEAT_MS, 15000, 'STREAM_HEARTBEAT_MS'),
  STREAM_QUEUE_CAPACITY: parsePositiveInt(process.env.STREAM_QUEUE_CAPACITY, 256, 'STREAM_QUEUE_CAPACITY'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export type Env = typeof env;

export function isReasoningConfigured(): boolean {
  return !!env.REASONING_API_KEY && !!env.REASONING_BASE_URL;
}

export function isToolBackendConfigured(): boolean {
  return !!env.TOOL_BACKEND_URL || !!env.TOOL_BACKEND_COMMAND;
}

/**
 * Values that failed to parse, recorded while the module loaded.
 * Reported through the root logger once it exists.
 */
export function getConfigWarnings(): readonly string[] {
  return configWarnings;
}

// Log configuration on startup (redact secrets)
export function describeConfiguration(): Record<string, unknown> {
  return {
    environment: env.NODE_ENV,
    server: `${env.HOST}:${env.PORT}`,
    reasoningConfigured: isReasoningConfigured(),
    reasoningModel: env.REASONING_MODEL,
    toolBackend: env.TOOL_BACKEND_URL || (env.TOOL_BACKEND_COMMAND ? `stdio:${env.TOOL_BACKEND_COMMAND}` : 'builtin-descriptors'),
    toolCallTimeoutMs: env.TOOL_CALL_TIMEOUT_MS,
    breakers: {
      toolBackend: {
        failureThreshold: env.CB_TOOL_FAILURE_THRESHOLD,
        recoveryTimeoutMs: env.CB_TOOL_RECOVERY_TIMEOUT_MS,
        probeQuota: env.CB_TOOL_PROBE_QUOTA,
      },
      reasoningBackend: {
        failureThreshold: env.CB_REASONING_FAILURE_THRESHOLD,
        recoveryTimeoutMs: env.CB_REASONING_RECOVERY_TIMEOUT_MS,
        probeQuota: env.CB_REASONING_PROBE_QUOTA,
      },
    },
    maxInputLength: env.MAX_INPUT_LENGTH,
    heartbeatMs: env.STREAM_HEARTBEAT_MS,
  };
}

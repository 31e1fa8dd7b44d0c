// Tool system types
// Descriptors come from Tool Backend discovery; the core knows only name, schema and destructiveness

import type { ToolErrorKind } from '../../utils/errors.js';

export interface JsonSchemaProperty {
  type?: string | string[];
  description?: string;
  enum?: unknown[];
  const?: unknown;
  minLength?: number;
  maxLength?: number;
  minimum?: number;
  maximum?: number;
  items?: JsonSchemaProperty;
  default?: unknown;
}

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
  additionalProperties?: boolean;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  /** Irreversible; dispatched only with an explicit confirmation argument. */
  destructive: boolean;
}

export interface ToolCallIntent {
  /** Backend-assigned id used to pair the result with the call in the conversation. */
  callId: string;
  toolName: string;
  arguments: Record<string, unknown>;
  isDestructive: boolean;
  argumentsError?: string;
}

export type ToolPayload = Record<string, unknown> | unknown[];

export type ToolCallResult =
  | { toolName: string; success: true; payload: ToolPayload; errorKind: null; message?: undefined }
  | { toolName: string; success: false; payload: null; errorKind: ToolErrorKind; message: string };

export interface ToolCallOptions {
  signal: AbortSignal;
}

/** Remote executor of named operations. */
export interface ToolBackend {
  readonly name: string;
  listTools(): Promise<ToolDescriptor[]>;
  /**
   * Resolves with the operation's payload. Domain failures reject with
   * ToolBackendError; anything else is a transport failure.
   */
  callTool(name: string, args: Record<string, unknown>, options: ToolCallOptions): Promise<ToolPayload>;
  close(): Promise<void>;
}

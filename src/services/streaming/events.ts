// Stream events and their SSE framing
//   event: <type>
//   data: <json>
//   (blank line)

import type { OrchestratorErrorKind, ToolErrorKind } from '../../utils/errors.js';

export type ToolCallStatus = 'in_progress' | 'success' | 'failed';

export interface ThinkingEvent {
  type: 'thinking';
  requestId: string;
  content: string;
}

export interface ToolCallEvent {
  type: 'tool_call';
  requestId: string;
  toolName: string;
  arguments: Record<string, unknown>;
  status: ToolCallStatus;
  errorKind?: ToolErrorKind;
  result?: unknown;
}

export interface ResponseDeltaEvent {
  type: 'response_delta';
  requestId: string;
  delta: string;
  accumulated: string;
}

export interface ErrorEvent {
  type: 'error';
  requestId: string;
  errorKind: OrchestratorErrorKind;
  message: string;
  recoverable: boolean;
}

export interface DoneEvent {
  type: 'done';
  requestId: string;
  finalOutput: string;
  toolsCalled: string[];
  success: boolean;
}

export type StreamEvent = ThinkingEvent | ToolCallEvent | ResponseDeltaEvent | ErrorEvent | DoneEvent;

export type StreamEventType = StreamEvent['type'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** What producers hand to a sink; the sink stamps the request's correlation id. */
export type StreamEventInput = DistributiveOmit<StreamEvent, 'requestId'>;

export type TerminalEvent = ErrorEvent | DoneEvent;

/** SSE comment line; ignored by EventSource clients and outside the event sequence. */
export const KEEP_ALIVE_FRAME = ': keep-alive\n\n';

export function isTerminal(event: StreamEvent | StreamEventInput): boolean {
  return event.type === 'error' || event.type === 'done';
}

export function formatSseFrame(event: StreamEvent): string {
  const { type, ...data } = event;
  return `event: ${type}\ndata: ${JSON.stringify(data)}\n\n`;
}

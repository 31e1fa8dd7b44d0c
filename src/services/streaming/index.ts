export { StreamSink, openStream } from './streamer.js';
export type { CancelReason, StreamerOptions, StreamWriter } from './streamer.js';
export { createResponseWriter } from './response-writer.js';
export { KEEP_ALIVE_FRAME, formatSseFrame, isTerminal } from './events.js';
export type {
  DoneEvent,
  ErrorEvent,
  ResponseDeltaEvent,
  StreamEvent,
  StreamEventInput,
  StreamEventType,
  TerminalEvent,
  ThinkingEvent,
  ToolCallEvent,
  ToolCallStatus,
} from './events.js';

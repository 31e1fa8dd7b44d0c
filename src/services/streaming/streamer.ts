// Event streamer
// Bounded queue between the orchestrator (producer) and one writer loop (consumer)

import type { RequestContext } from '../correlation.js';
import { logEvent } from '../../observability/logger.js';
import { StreamContractError } from '../../utils/errors.js';
import {
  formatSseFrame,
  isTerminal,
  KEEP_ALIVE_FRAME,
  type StreamEvent,
  type StreamEventInput,
} from './events.js';

/**
 * Transport side of a stream. `write` settles once the frame has been handed
 * to the transport (after any backpressure wait) and rejects when the channel
 * is gone.
 */
export interface StreamWriter {
  write(frame: string): Promise<void>;
  end(): void;
  /** Registers a callback for the client closing the channel. */
  onClose(listener: () => void): void;
}

export interface StreamerOptions {
  /** Aborted when the stream is cancelled; its signal should be the context's signal. */
  controller: AbortController;
  heartbeatMs: number;
  queueCapacity: number;
  now?: () => number;
}

export type CancelReason = 'client_disconnected' | 'write_failed' | 'slow_consumer';

export class StreamSink {
  private readonly queue: string[] = [];
  private terminal: StreamEvent | null = null;
  private closing = false;
  private finished = false;
  private cancelReason: CancelReason | null = null;
  private draining = false;
  private lastWriteAt: number;
  private readonly heartbeat: ReturnType<typeof setInterval>;
  private readonly settled: Promise<void>;
  private resolveSettled: () => void = () => undefined;
  private readonly now: () => number;
  private eventCount = 0;

  constructor(
    private readonly ctx: RequestContext,
    private readonly writer: StreamWriter,
    private readonly options: StreamerOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.lastWriteAt = this.now();
    this.settled = new Promise<void>(resolve => {
      this.resolveSettled = resolve;
    });

    this.heartbeat = setInterval(() => this.beat(), options.heartbeatMs);
    this.heartbeat.unref();

    writer.onClose(() => {
      if (!this.finished) {
        this.cancel('client_disconnected');
      }
    });
  }

  get cancelled(): boolean {
    return this.cancelReason !== null;
  }

  get terminalEvent(): StreamEvent | null {
    return this.terminal;
  }

  /** Resolves once every queued frame was written and the writer ended, or on cancellation. */
  get done(): Promise<void> {
    return this.settled;
  }

  /**
   * Queue an event. Returns false when the stream was cancelled and the event
   * was dropped. Emitting after a terminal event or after close() is a
   * contract violation.
   */
  emit(input: StreamEventInput): boolean {
    if (this.cancelled) {
      return false;
    }
    if (this.terminal) {
      throw new StreamContractError(`Cannot emit "${input.type}" after terminal "${this.terminal.type}" event`);
    }
    if (this.closing) {
      throw new StreamContractError(`Cannot emit "${input.type}" on a closed stream`);
    }
    if (this.queue.length >= this.options.queueCapacity) {
      this.cancel('slow_consumer');
      return false;
    }

    const event: StreamEvent = { requestId: this.ctx.id, ...input };
    if (isTerminal(event)) {
      this.terminal = event;
    }

    this.eventCount++;
    this.queue.push(formatSseFrame(event));
    this.flush();
    return true;
  }

  /** No further events; the writer ends after the queue drains. */
  close(): void {
    if (this.closing || this.cancelled) return;
    this.closing = true;
    this.flush();
  }

  cancel(reason: CancelReason): void {
    if (this.cancelled || this.finished) return;
    this.cancelReason = reason;
    this.queue.length = 0;
    clearInterval(this.heartbeat);

    logEvent(this.ctx.logger, 'info', 'stream_cancelled', `Stream cancelled: ${reason}`, {
      details: { reason, eventsEmitted: this.eventCount },
    });

    this.options.controller.abort(reason);
    this.resolveSettled();
  }

  private beat(): void {
    if (this.draining || this.queue.length > 0 || this.cancelled || this.finished) return;
    if (this.now() - this.lastWriteAt < this.options.heartbeatMs) return;
    this.queue.push(KEEP_ALIVE_FRAME);
    this.flush();
  }

  private flush(): void {
    if (this.draining) return;
    this.draining = true;
    void this.drain();
  }

  // Never rejects; write failures cancel the stream.
  private async drain(): Promise<void> {
    try {
      while (this.queue.length > 0 && !this.cancelled) {
        const frame = this.queue.shift();
        if (frame === undefined) break;
        try {
          await this.writer.write(frame);
          this.lastWriteAt = this.now();
        } catch (error) {
          logEvent(this.ctx.logger, 'warn', 'stream_write_failed', 'Failed to write stream frame', {
            details: { error: error instanceof Error ? error.message : String(error) },
          });
          this.cancel('write_failed');
          return;
        }
      }
    } finally {
      this.draining = false;
    }

    if (this.closing && !this.cancelled) {
      this.finish();
    }
  }

  private finish(): void {
    if (this.finished) return;
    this.finished = true;
    clearInterval(this.heartbeat);
    this.writer.end();
    this.resolveSettled();
  }
}

export function openStream(ctx: RequestContext, writer: StreamWriter, options: StreamerOptions): StreamSink {
  return new StreamSink(ctx, writer, options);
}

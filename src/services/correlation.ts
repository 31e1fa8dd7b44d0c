// Request correlation
// Every log line and stream event for a request reads its id from the RequestContext

import crypto from 'crypto';
import type { AppLogger } from '../observability/logger.js';
import type { Request } from './admission.js';

export interface RequestContext {
  readonly id: string;
  readonly request: Request;
  readonly logger: AppLogger;
  readonly signal: AbortSignal;
}

export interface TagOptions {
  logger: AppLogger;
  signal?: AbortSignal;
  /** Client-supplied id; adopted only when it is a safe token. */
  clientRequestId?: string;
}

const CLIENT_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export function generateRequestId(now: number = Date.now()): string {
  return `req_${now.toString(36)}_${crypto.randomBytes(6).toString('hex')}`;
}

export function tag(request: Request, options: TagOptions): RequestContext {
  const clientId = options.clientRequestId?.trim();
  const id = clientId && CLIENT_ID_PATTERN.test(clientId)
    ? clientId
    : generateRequestId(request.receivedAt.getTime());

  return Object.freeze({
    id,
    request: Object.freeze({ ...request, id }),
    logger: options.logger.child({ requestId: id }),
    signal: options.signal ?? new AbortController().signal,
  });
}

// Chat streaming route
// Admission runs before any dependency call; admitted requests stream as SSE until a terminal event or disconnect

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z, ZodError } from 'zod';
import { admit, type Request } from '../services/admission.js';
import { tag } from '../services/correlation.js';
import type { Orchestrator } from '../services/orchestrator/index.js';
import { createResponseWriter, openStream } from '../services/streaming/index.js';
import type { MetricsTracker } from '../observability/metrics.js';
import { logEvent } from '../observability/logger.js';
import { AdmissionError, AppError, ErrorCode, formatErrorResponse } from '../utils/errors.js';

const ChatStreamSchema = z.object({
  message: z.string(),
  request_id: z.string().optional(),
});

export interface ChatRouteDeps {
  orchestrator: Orchestrator;
  metrics: MetricsTracker;
  maxInputLength: number;
  heartbeatMs: number;
  queueCapacity: number;
}

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

export function admissionErrorBody(error: AdmissionError) {
  return {
    error: ErrorCode.INVALID_INPUT,
    errorKind: error.kind,
    message: error.message,
  };
}

export function chatRoutes(deps: ChatRouteDeps) {
  return async function (server: FastifyInstance) {
    // Replaces the default parser so malformed UTF-8 is rejected instead of silently replaced.
    server.removeContentTypeParser('application/json');
    server.addContentTypeParser('application/json', { parseAs: 'buffer' }, async (_request: FastifyRequest, body: Buffer) => {
      let text: string;
      try {
        text = strictUtf8.decode(body);
      } catch {
        throw new AdmissionError('InvalidEncoding', 'Request body is not valid UTF-8');
      }
      try {
        return JSON.parse(text);
      } catch {
        throw AppError.badRequest('Request body is not valid JSON');
      }
    });

    server.setErrorHandler<Error>((error, request, reply) => {
      if (error instanceof AdmissionError) {
        deps.metrics.trackRequestRejected();
        logEvent(request.log, 'info', 'request_rejected', error.message, { details: { errorKind: error.kind } });
        return reply.code(400).send(admissionErrorBody(error));
      }
      if (error instanceof AppError) {
        return reply.code(error.statusCode).send(formatErrorResponse(error));
      }
      request.log.error(error);
      return reply.code(500).send(formatErrorResponse(AppError.internal()));
    });

    // POST /v1/chat/stream - Run one request and stream its events
    server.post('/chat/stream', async (request, reply) => {
      let body: z.infer<typeof ChatStreamSchema>;
      try {
        body = ChatStreamSchema.parse(request.body);
      } catch (error) {
        if (error instanceof ZodError) {
          return reply.code(400).send({ error: 'Invalid request body', details: error.errors });
        }
        throw error;
      }

      // Throws AdmissionError into the error handler; nothing has been streamed yet.
      const admitted: Request = admit(body.message, undefined, { maxLength: deps.maxInputLength });

      const controller = new AbortController();
      const ctx = tag(admitted, {
        logger: request.log,
        signal: controller.signal,
        clientRequestId: body.request_id,
      });

      reply.hijack();
      for (const [name, value] of Object.entries(reply.getHeaders())) {
        if (value !== undefined) reply.raw.setHeader(name, value);
      }
      reply.raw.setHeader('Content-Type', 'text/event-stream');
      reply.raw.setHeader('Cache-Control', 'no-cache');
      reply.raw.setHeader('Connection', 'keep-alive');
      reply.raw.setHeader('X-Request-Id', ctx.id);
      reply.raw.statusCode = 200;

      const sink = openStream(ctx, createResponseWriter(reply.raw), {
        controller,
        heartbeatMs: deps.heartbeatMs,
        queueCapacity: deps.queueCapacity,
      });

      await deps.orchestrator.run(ctx, sink);
      await sink.done;
    });
  };
}

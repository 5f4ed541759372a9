import { randomUUID } from 'node:crypto';
import type { IncomingHttpHeaders, IncomingMessage } from 'node:http';
import type { FastifyRequest } from 'fastify';

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = 'X-Request-Id';
export const REQUEST_ID_HEADER_LOWER = 'x-request-id';

const MAX_INCOMING_ID_LENGTH = 128;

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Extract request ID from incoming headers or generate a new one
 */
export function getOrGenerateRequestId(headers: IncomingHttpHeaders): string {
  const incomingId = headers[REQUEST_ID_HEADER_LOWER];

  if (typeof incomingId === 'string') {
    const trimmed = incomingId.trim();
    if (trimmed.length > 0 && trimmed.length <= MAX_INCOMING_ID_LENGTH) {
      return trimmed;
    }
  }

  return generateRequestId();
}

/**
 * Fastify `genReqId` option. request.id carries the request ID from the
 * start of the lifecycle, so the per-request logger is bound to it too.
 */
export function genReqId(raw: IncomingMessage): string {
  return getOrGenerateRequestId(raw.headers);
}

/**
 * Get request ID from Fastify request
 */
export function getRequestId(request?: FastifyRequest): string {
  if (!request) {
    return 'unknown';
  }
  return request.id || 'unknown';
}

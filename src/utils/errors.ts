import { ZodError } from 'zod';
import type { FastifyRequest } from 'fastify';
import { getRequestId } from './request-id.js';
import { redactLogMessage } from './redaction.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode =
  | 'BAD_INPUT'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'RATE_LIMITED'
  | 'PERSIST_FAILED'
  | 'INTERNAL';

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: 'error.v1';
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Errors that already know which envelope code they map to
 */
export interface CodedError extends Error {
  readonly code: string;
  readonly errorCode: ErrorCode;
}

function isCodedError(error: Error): error is CodedError {
  return 'errorCode' in error && typeof error.errorCode === 'string';
}

function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : undefined;
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: 'error.v1',
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    'BAD_INPUT',
    'Validation failed',
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

function sanitizeMessage(raw: string): string {
  // Remove file paths before the generic PII pass
  return redactLogMessage(raw.replace(/\/[\w/.@-]+/g, '[path]'));
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack/PII)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof Error) {
    if (isCodedError(error)) {
      return buildErrorV1(error.errorCode, sanitizeMessage(error.message), { reason: error.code }, requestId);
    }

    const statusCode = readNumber(error, 'statusCode');
    const fastifyCode = readString(error, 'code');

    if (statusCode === 429 || error.message.toLowerCase().includes('rate limit')) {
      return buildErrorV1(
        'RATE_LIMITED',
        'Too many requests',
        { retry_after_seconds: readNumber(error, 'retryAfter') ?? 60 },
        requestId
      );
    }

    if (fastifyCode === 'FST_ERR_CTP_BODY_TOO_LARGE') {
      return buildErrorV1('BAD_INPUT', 'Request body too large', undefined, requestId);
    }

    // Fastify's own 4xx errors (malformed JSON, unsupported media type)
    if (statusCode === 400 || statusCode === 415 || fastifyCode === 'FST_ERR_CTP_INVALID_JSON_BODY') {
      return buildErrorV1('BAD_INPUT', sanitizeMessage(error.message), undefined, requestId);
    }

    if (statusCode === 404) {
      return buildErrorV1('NOT_FOUND', sanitizeMessage(error.message), undefined, requestId);
    }

    return buildErrorV1('INTERNAL', sanitizeMessage(error.message || 'An unexpected error occurred'), undefined, requestId);
  }

  if (typeof error === 'string') {
    return buildErrorV1('INTERNAL', sanitizeMessage(error), undefined, requestId);
  }

  return buildErrorV1('INTERNAL', 'An unexpected error occurred', undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'BAD_INPUT':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'CONFLICT':
      return 409;
    case 'RATE_LIMITED':
      return 429;
    case 'PERSIST_FAILED':
    case 'INTERNAL':
    default:
      return 500;
  }
}

// packages/playlist-backend/src/transport/error-handler.ts
//
// Centralized error handling for Fastify.
// Maps domain errors to HTTP statuses, logs with redaction and never leaks internals.
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import { InvalidRequestError, NotFoundError } from '@vibelist/contracts';

import { logger } from '../infrastructure/logger.js';

export interface ErrorResponse {
  error: string;
  message: string;
  code?: string;
  timestamp: string;
  requestId: string;
}

export enum ErrorType {
  VALIDATION_ERROR = 'validation_error',
  NOT_FOUND = 'not_found',
  CLIENT_ERROR = 'client_error',
  SERVER_ERROR = 'server_error',
}

function readStatusCode(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function classifyError(error: unknown): ErrorType {
  if (error instanceof InvalidRequestError || error instanceof ZodError) {
    return ErrorType.VALIDATION_ERROR;
  }
  if (error instanceof NotFoundError) {
    return ErrorType.NOT_FOUND;
  }
  const statusCode = readStatusCode(error);
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return ErrorType.CLIENT_ERROR;
  }
  return ErrorType.SERVER_ERROR;
}

function getHttpStatus(errorType: ErrorType, error: unknown): number {
  switch (errorType) {
    case ErrorType.VALIDATION_ERROR: {
      return 400;
    }
    case ErrorType.NOT_FOUND: {
      return 404;
    }
    case ErrorType.CLIENT_ERROR: {
      return readStatusCode(error) ?? 400;
    }
    default: {
      return 500;
    }
  }
}

function getErrorCode(errorType: ErrorType): string {
  switch (errorType) {
    case ErrorType.VALIDATION_ERROR: {
      return 'validation_failed';
    }
    case ErrorType.NOT_FOUND: {
      return 'not_found';
    }
    case ErrorType.CLIENT_ERROR: {
      return 'client_error';
    }
    default: {
      return 'internal_error';
    }
  }
}

function getSafeErrorMessage(error: unknown, errorType: ErrorType): string {
  if (errorType === ErrorType.SERVER_ERROR) {
    return 'An internal server error occurred';
  }
  if (error instanceof ZodError) {
    const first = error.issues[0];
    return first ? `${first.path.join('.') || 'body'}: ${first.message}` : 'Validation failed';
  }
  if (error instanceof Error && error.message.length < 200) {
    return error.message;
  }
  return 'An error occurred';
}

function getResponseCode(error: unknown, errorType: ErrorType): string | undefined {
  if (error instanceof InvalidRequestError) return error.code;
  if (error instanceof ZodError) return error.issues[0]?.code ?? 'validation_failed';
  if (errorType === ErrorType.CLIENT_ERROR && error && typeof error === 'object' && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'key', 'auth', 'authorization'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function redactSensitiveData(context: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(context)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))) {
      redacted[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      redacted[key] = redactSensitiveData(value);
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}

function logError(error: unknown, request: FastifyRequest, errorType: ErrorType): void {
  const logContext = {
    event: 'http_error',
    errorType,
    method: request.method,
    url: request.url,
    requestId: request.id,
    ...redactSensitiveData({
      error:
        error instanceof Error
          ? { name: error.name, message: error.message, stack: error.stack }
          : String(error),
    }),
  };

  if (errorType === ErrorType.SERVER_ERROR) {
    logger.error('HTTP request failed with server error', logContext);
  } else {
    logger.warn('HTTP request failed with client error', logContext);
  }
}

export function errorHandler(error: unknown, request: FastifyRequest, reply: FastifyReply): void {
  const errorType = classifyError(error);
  logError(error, request, errorType);

  const body: ErrorResponse = {
    error: getErrorCode(errorType),
    message: getSafeErrorMessage(error, errorType),
    code: getResponseCode(error, errorType),
    timestamp: new Date().toISOString(),
    requestId: request.id,
  };

  void reply.code(getHttpStatus(errorType, error)).send(body);
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler(errorHandler);
}

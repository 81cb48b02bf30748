import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { errors as joseErrors } from 'jose';
import {
  AggregationError,
  ConfigurationError,
  PersistenceError,
  ResolutionError,
  SchemaValidationError,
  UnknownSourceError,
} from '@crosscheck/shared/src/utils/errors.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof joseErrors.JOSEError) {
    const body: ErrorResponse = {
      error: 'Invalid or expired token',
      code: 'UNAUTHORIZED',
      requestId,
    };
    return c.json(body, 401);
  }

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  if (err instanceof SchemaValidationError) {
    const body: ErrorResponse = {
      error: err.message,
      code: 'VALIDATION_ERROR',
      requestId,
      details: err.validationErrors,
    };
    return c.json(body, 400);
  }

  if (err instanceof UnknownSourceError) {
    const body: ErrorResponse = {
      error: err.message,
      code: 'SOURCE_NOT_FOUND',
      requestId,
    };
    return c.json(body, 404);
  }

  if (err instanceof ResolutionError) {
    const body: ErrorResponse = {
      error: err.message,
      code: err.code,
      requestId,
      details: err.suggestions,
    };
    return c.json(body, 422);
  }

  if (err instanceof AggregationError) {
    log.warn({ requestId, code: err.code, details: err.details }, 'Aggregation failed');
    const body: ErrorResponse = {
      error: err.message,
      code: err.code,
      requestId,
    };
    return c.json(body, 503);
  }

  if (err instanceof HTTPException) {
    const body: ErrorResponse = {
      error: err.message,
      code: 'BAD_REQUEST',
      requestId,
    };
    return c.json(body, err.status);
  }

  if (err instanceof ConfigurationError || err instanceof PersistenceError) {
    log.error({ requestId, code: err.code, error: err.message }, 'Server misconfigured or storage unavailable');
    const body: ErrorResponse = {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      requestId,
    };
    return c.json(body, 500);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}

/**
 * Error Handler Middleware
 *
 * Centralized error handling for the API.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ProfileValidationError } from '../../domain/entities/ApplicantProfile.js';
import { EnrichmentError } from '../../domain/entities/EnrichmentRecord.js';
import { ConfigurationError } from '../../config/ScreeningPolicy.js';

// =============================================================================
// ERROR TYPES
// =============================================================================

export class ApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class BadRequestError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'BAD_REQUEST', details);
  }
}

// =============================================================================
// ERROR RESPONSE TYPE
// =============================================================================

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    details?: Record<string, unknown>;
    requestId?: string;
  };
}

function requestIdOf(req: Request): string | undefined {
  const header = req.headers['x-request-id'];
  return Array.isArray(header) ? header[0] : header;
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Log the error
  console.error('[API] Error:', {
    name: err.name,
    message: err.message,
    path: req.path,
    method: req.method,
  });

  // Get request ID for tracking
  const requestId = requestIdOf(req);

  // Handle known error types
  if (err instanceof ApiError) {
    res.status(err.statusCode).json({
      error: {
        message: err.message,
        code: err.code,
        details: err.details,
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  if (err instanceof ProfileValidationError) {
    res.status(422).json({
      error: {
        message: err.message,
        code: 'INVALID_PROFILE',
        details: err.details,
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  // The model service failed or answered out of shape
  if (err instanceof EnrichmentError) {
    res.status(502).json({
      error: {
        message: err.message,
        code: `ENRICHMENT_${err.kind.toUpperCase()}`,
        details: { applicantId: err.applicantId, attempts: err.attempts, retryable: err.retryable },
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  if (err instanceof ConfigurationError) {
    res.status(503).json({
      error: {
        message: err.message,
        code: 'CONFIGURATION_ERROR',
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  // Handle request body validation errors
  if (err instanceof ZodError) {
    res.status(422).json({
      error: {
        message: 'Validation error',
        code: 'VALIDATION_ERROR',
        details: {
          errors: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        },
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  // Body parser rejects malformed JSON with a 400
  if ('type' in err && err.type === 'entity.parse.failed') {
    res.status(400).json({
      error: {
        message: 'Malformed JSON body',
        code: 'BAD_REQUEST',
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  // Default to internal server error
  res.status(500).json({
    error: {
      message:
        process.env.NODE_ENV === 'production'
          ? 'Internal server error'
          : err.message,
      code: 'INTERNAL_ERROR',
      requestId,
    },
  } satisfies ErrorResponse);
}

// =============================================================================
// NOT FOUND HANDLER
// =============================================================================

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      message: `Route not found: ${req.method} ${req.path}`,
      code: 'ROUTE_NOT_FOUND',
      requestId: requestIdOf(req),
    },
  } satisfies ErrorResponse);
}

import { Request, Response, NextFunction } from 'express';
import * as functions from 'firebase-functions';
import { ZodError } from 'zod';
import {
  BlockedDecisionError,
  DataLoadError,
  DrugSafetyError,
  MissingReasonError,
  SaveBlockedError,
  UnknownAlertError,
} from '../services/drugSafety/errors';

type ErrorBody = {
  code: string;
  message: string;
  [key: string]: unknown;
};

/**
 * Map a thrown error onto the API's `{ code, message }` response shape.
 */
export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: { code: 'invalid_request', message: 'Invalid request body', details: err.errors },
    };
  }

  if (err instanceof MissingReasonError || err instanceof BlockedDecisionError || err instanceof UnknownAlertError) {
    return { status: 422, body: { code: err.code, message: err.message, alertId: err.alertId } };
  }

  if (err instanceof SaveBlockedError) {
    return {
      status: 422,
      body: { code: err.code, message: err.message, unresolvedAlertIds: [...err.unresolvedAlertIds] },
    };
  }

  if (err instanceof DataLoadError) {
    return {
      status: 503,
      body: { code: err.code, message: 'Drug safety reference data is unavailable' },
    };
  }

  const message = err instanceof Error ? err.message : 'An unexpected error occurred';
  const code = err instanceof DrugSafetyError ? err.code : 'server_error';

  if (process.env.NODE_ENV === 'production') {
    // In production, don't leak internals
    return { status: 500, body: { code, message: 'An unexpected error occurred' } };
  }
  return {
    status: 500,
    body: { code, message, ...(err instanceof Error && err.stack ? { stack: err.stack } : {}) },
  };
}

export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction) {
  // If headers have already been sent, delegate to the default Express error handler
  if (res.headersSent) {
    return next(err);
  }

  const { status, body } = toErrorResponse(err);
  if (status >= 500) {
    functions.logger.error('Unhandled error:', err);
  } else {
    functions.logger.warn(`[errorHandler] ${body.code}`, { path: req.path, message: body.message });
  }

  res.status(status).json(body);
}

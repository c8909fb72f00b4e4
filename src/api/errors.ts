/**
 * Lending Ledger - HTTP Error Mapping
 */

import { Response } from 'express';
import { ZodError } from 'zod';
import { isLendingError, isStateGuardError } from '../shared/errors';

/**
 * Request-level failure raised by the HTTP layer itself (missing identity,
 * malformed path parameters)
 */
export class RequestError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

export interface HttpError {
  status: number;
  body: {
    error: string;
    code?: string;
    details?: string[];
  };
}

export function toHttpError(error: unknown): HttpError {
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: 'Invalid request',
        code: 'VALIDATION_ERROR',
        details: error.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`),
      },
    };
  }

  if (error instanceof RequestError) {
    return { status: error.status, body: { error: error.message } };
  }

  if (isLendingError(error)) {
    return { status: lendingStatus(error.code, isStateGuardError(error)), body: { error: error.message, code: error.code } };
  }

  return { status: 500, body: { error: 'Internal server error' } };
}

function lendingStatus(code: string, stateGuard: boolean): number {
  if (code === 'NOT_FOUND') return 404;
  if (code === 'UNAUTHORIZED') return 403;
  if (code === 'TRANSFER_FAILED') return 502;
  if (stateGuard) return 409;
  return 400;
}

export function sendError(res: Response, error: unknown): void {
  const { status, body } = toHttpError(error);
  if (status >= 500) {
    console.error('[API] Request failed:', error);
  }
  res.status(status).json(body);
}

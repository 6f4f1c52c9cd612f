import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import type { ApiResponse, ErrorCode } from '@shared/types';
import { isClaimWorkflowError } from '@core/errors';

export const requestLogger = morgan('dev');

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  CLAIM_NOT_FOUND: 404,
  VALIDATION_FAILED: 400,
  INVALID_TRANSITION: 409,
  TERMINAL_STATE: 409,
  INSERTION_CONFLICT: 409,
  INVALID_INSERTION: 409,
  ORCHESTRATION_IN_PROGRESS: 409,
  EVALUATION_PENDING: 409,
  NOT_UNDER_INVESTIGATION: 409,
  EVIDENCE_LOCKED: 409,
  ORCHESTRATION_CANCELLED: 499,
  AGENT_UNAVAILABLE: 503,
};

/** express.json() rejects unparseable bodies with this error type. */
function isMalformedBody(err: unknown): boolean {
  return (
    typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed'
  );
}

export function statusFor(err: unknown): number {
  if (isClaimWorkflowError(err)) return STATUS_BY_CODE[err.code];
  return isMalformedBody(err) ? 400 : 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  const status = statusFor(err);
  if (isClaimWorkflowError(err)) {
    if (status >= 500) console.error('[ERROR]', err.message);
    const response: ApiResponse = { success: false, error: err.message, code: err.code };
    res.status(status).json(response);
    return;
  }

  if (isMalformedBody(err)) {
    const response: ApiResponse = {
      success: false,
      error: 'Request body is not valid JSON',
      code: 'VALIDATION_FAILED',
    };
    res.status(400).json(response);
    return;
  }

  console.error('[ERROR]', err.message);
  const response: ApiResponse = { success: false, error: err.message };
  res.status(500).json(response);
}

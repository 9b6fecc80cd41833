import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import { ZodError } from 'zod';
import { CALLER_HEADER } from '@shared/constants';
import type { EscrowErrorCode } from '@shared/types';
import { isEscrowError } from '@core/errors';

export const requestLogger = morgan('dev');

export const STATUS_BY_CODE: Record<EscrowErrorCode, number> = {
  Unauthorized: 403,
  JobNotFound: 404,
  JobNotOpen: 409,
  NoWorkSubmitted: 409,
  ReentrantCall: 409,
  LastAdministrator: 409,
  EmptyField: 400,
  InvalidDeadline: 400,
  NoValueDeposited: 400,
  TransferFailed: 502,
};

/**
 * The gateway in front of this service authenticates callers and forwards
 * their identity in a header.
 */
export function callerOf(req: Request): string {
  return req.header(CALLER_HEADER)?.trim() ?? '';
}

export function requireCaller(req: Request, res: Response, next: NextFunction) {
  if (!callerOf(req)) {
    res.status(401).json({ success: false, error: `${CALLER_HEADER} header is required` });
    return;
  }
  next();
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ZodError) {
    const detail = err.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    res.status(400).json({ success: false, error: detail });
    return;
  }

  if (isEscrowError(err)) {
    res.status(STATUS_BY_CODE[err.code]).json({ success: false, error: err.message, code: err.code });
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  console.error('[ERROR]', message);
  res.status(500).json({ success: false, error: message });
}

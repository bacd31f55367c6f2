import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { DomainError } from '@fleet-alerts/domain';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof DomainError) {
    if (err.status >= 500) console.error('[api] store failure', err.message);
    res.status(err.status).json({ error: err.code, message: err.message });
    return;
  }
  // body-parser and other middleware attach an HTTP status to their errors
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  console.error('[api] unhandled error', err);
  res.status(500).json({ error: 'Internal server error' });
}

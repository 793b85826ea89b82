import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { HttpError, ProfileNotFoundError } from '../errors.js';
import { createLogger } from '../log.js';

const log = createLogger('http');

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

// express 4 does not forward rejected promises to the error handler on its own
export function asyncHandler(fn: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function notFound(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ProfileNotFoundError) {
    res.status(400).json({ error: `${err.message}. Call POST /freigent/${err.userId}/profile first.` });
    return;
  }
  // body-parser failures carry their own 4xx status
  if (isClientError(err)) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  if (err instanceof HttpError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  log.error('unhandled request error', err);
  res.status(500).json({ error: 'Internal server error' });
}

function isClientError(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500 &&
    !(err instanceof HttpError)
  );
}

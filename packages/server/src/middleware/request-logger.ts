import type { NextFunction, Request, Response } from 'express';
import { info } from 'firebase-functions/logger';

/** One log line per finished response. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on('finish', () => {
    info('http:request', {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      duration_ms: Date.now() - start,
      user_id: req.user?.id ?? null,
      htmx: req.get('HX-Request') === 'true',
    });
  });
  next();
}

import type { Request, Response } from 'express';

export type ResponseMode = 'htmx' | 'json' | 'html';

export function isHtmx(req: Request): boolean {
  return req.get('HX-Request') === 'true';
}

/**
 * How an error or a redirect should be answered: HTMX fragments first,
 * then JSON for API paths and JSON bodies, full pages otherwise.
 */
export function responseMode(req: Request): ResponseMode {
  if (isHtmx(req)) {
    return 'htmx';
  }
  if (
    req.originalUrl.startsWith('/api/') ||
    req.is('application/json') === 'application/json' ||
    req.accepts(['html', 'json']) === 'json'
  ) {
    return 'json';
  }
  return 'html';
}

/** Full navigation for HTMX requests, a 303 for plain form posts. */
export function redirectTo(req: Request, res: Response, url: string): void {
  if (isHtmx(req)) {
    res.set('HX-Redirect', url).status(204).end();
    return;
  }
  res.redirect(303, url);
}

import type { NextFunction, Request, Response } from 'express';
import type { ReactElement } from 'react';
import type { ZodType, ZodTypeDef } from 'zod';
import { ZodError } from 'zod';
import { consumeFlash, addFlash } from '../middleware/flash.js';
import { resolveError } from '../middleware/error-handler.js';
import { redirectTo, responseMode } from '../middleware/htmx.js';
import { AppError, NotFoundError } from '../types/errors.js';
import { renderPage, renderPartial } from '../views/render.js';

export function sendPage(req: Request, res: Response, title: string, page: ReactElement): void {
  res.type('html').send(renderPage(page, { title, user: req.user ?? null, flash: consumeFlash(req) }));
}

export function sendPartial(res: Response, element: ReactElement): void {
  res.type('html').send(renderPartial(element));
}

export function parseId(value: string | undefined, resource: string): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new NotFoundError(resource, value ?? 'unknown');
  }
  return Number(value);
}

export function isFormRequest(req: Request): boolean {
  return typeof req.is(['application/x-www-form-urlencoded', 'multipart/form-data']) === 'string';
}

/** Forms post strings; JSON clients post the typed shape. Both end as T. */
export function parseBody<T>(
  req: Request,
  jsonSchema: ZodType<T, ZodTypeDef, unknown>,
  formSchema: ZodType<T, ZodTypeDef, unknown>
): T {
  const body: unknown = req.body ?? {};
  return isFormRequest(req) ? formSchema.parse(body) : jsonSchema.parse(body);
}

const LOCAL_ORIGIN = 'http://local';

/** Only same-site paths are followed after login. */
export function safeRedirectTarget(value: unknown, fallback = '/'): string {
  if (typeof value !== 'string' || !value.startsWith('/') || /[\\\u0000-\u001f\u007f]/.test(value)) {
    return fallback;
  }
  const target = new URL(value, LOCAL_ORIGIN);
  if (target.origin !== LOCAL_ORIGIN) {
    return fallback;
  }
  return `${target.pathname}${target.search}${target.hash}`;
}

/**
 * Plain form posts that fail with a client error go back to the form with
 * a flash; everything else reaches the error handler.
 */
export function failBack(req: Request, res: Response, next: NextFunction, error: unknown, url: string): void {
  if (
    responseMode(req) === 'html' &&
    (error instanceof ZodError || (error instanceof AppError && error.statusCode < 500))
  ) {
    addFlash(req, 'error', resolveError(error).displayMessage);
    redirectTo(req, res, url);
    return;
  }
  next(error);
}

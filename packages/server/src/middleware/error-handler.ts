import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { error as logError, warn } from 'firebase-functions/logger';
import type { ApiError } from '@magic-chef/shared';
import { AppError } from '../types/errors.js';
import { renderErrorPage, renderFlashFragment } from '../views/render.js';
import { responseMode } from './htmx.js';

export interface ResolvedError {
  status: number;
  body: ApiError;
  /** What a person reads in a flash message or on the error page */
  displayMessage: string;
}

// body-parser and friends attach an HTTP status to their errors
function httpStatusOf(err: Error): number | null {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
}

export function resolveError(err: Error): ResolvedError {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Invalid request data', details: err.errors },
      },
      displayMessage: [...new Set(err.errors.map((issue) => issue.message))].join('. '),
    };
  }

  if (err instanceof AppError) {
    return {
      status: err.statusCode,
      body: {
        success: false,
        error: {
          code: err.code,
          message: err.message,
          ...(err.details !== undefined ? { details: err.details } : {}),
        },
      },
      displayMessage: err.message,
    };
  }

  const status = httpStatusOf(err);
  if (status !== null) {
    return {
      status,
      body: { success: false, error: { code: 'BAD_REQUEST', message: err.message } },
      displayMessage: err.message,
    };
  }

  return {
    status: 500,
    body: { success: false, error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' } },
    displayMessage: 'An unexpected error occurred',
  };
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const resolved = resolveError(err);

  const payload = {
    method: req.method,
    path: req.originalUrl,
    status: resolved.status,
    code: resolved.body.error.code,
    error_message: err.message,
  };
  if (resolved.status >= 500) {
    logError('http:error', { ...payload, stack: err.stack });
  } else {
    warn('http:client_error', payload);
  }

  switch (responseMode(req)) {
    case 'json':
      res.status(resolved.status).json(resolved.body);
      return;
    case 'htmx':
      res
        .status(resolved.status)
        .set('HX-Retarget', '#flash-messages')
        .set('HX-Reswap', 'innerHTML')
        .type('html')
        .send(renderFlashFragment([{ level: 'error', message: resolved.displayMessage }]));
      return;
    case 'html':
      res
        .status(resolved.status)
        .type('html')
        .send(renderErrorPage(resolved.status, resolved.displayMessage, req.user ?? null));
      return;
  }
}

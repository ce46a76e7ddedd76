import type { NextFunction, Request, Response } from 'express';
import type { User } from '@magic-chef/shared';
import type { AuthService } from '../services/index.js';
import { UnauthorizedError } from '../types/errors.js';
import { addFlash } from './flash.js';
import { responseMode } from './htmx.js';

declare global {
  namespace Express {
    interface Request {
      user?: User;
    }
  }
}

/** Resolve the session's user id into req.user. */
export function loadUser(auth: AuthService) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const userId = req.session.userId;
    if (userId !== undefined) {
      const user = auth.getUser(userId);
      if (user) {
        req.user = user;
      } else {
        delete req.session.userId;
      }
    }
    next();
  };
}

/**
 * Page requests go to the login form; HTMX and JSON callers get a 401.
 */
export function requireAuth(req: Request, res: Response, next: NextFunction): void {
  if (req.user) {
    next();
    return;
  }
  if (responseMode(req) === 'html') {
    addFlash(req, 'warning', 'Please log in first');
    res.redirect(303, `/auth/login?next=${encodeURIComponent(req.originalUrl)}`);
    return;
  }
  next(new UnauthorizedError());
}

/** The logged-in user; only call behind requireAuth. */
export function currentUser(req: Request): User {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}

/** Establish a fresh session for user; resolves once it is stored. */
export function startSession(req: Request, user: User): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate((regenerateError: unknown) => {
      if (regenerateError) {
        reject(regenerateError);
        return;
      }
      req.session.userId = user.id;
      req.session.save((saveError: unknown) => {
        if (saveError) {
          reject(saveError);
          return;
        }
        resolve();
      });
    });
  });
}

export function endSession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.destroy((error: unknown) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

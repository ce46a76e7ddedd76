import session, { Store, type SessionData } from 'express-session';
import type { RequestHandler } from 'express';
import { z } from 'zod';
import { warn } from 'firebase-functions/logger';
import type { FlashMessage } from '@magic-chef/shared';
import type { SessionRepository } from '../repositories/index.js';

declare module 'express-session' {
  interface SessionData {
    userId?: number;
    flash?: FlashMessage[];
  }
}

export const SESSION_COOKIE_NAME = 'magic_chef.sid';
const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;
const SESSION_MAX_AGE_MS = 14 * DEFAULT_TTL_MS;

const storedSessionSchema = z.object({
  cookie: z.object({
    originalMaxAge: z.number().nullable(),
    expires: z.string().nullable().optional(),
    httpOnly: z.boolean().optional(),
    path: z.string().optional(),
    domain: z.string().optional(),
    secure: z.union([z.boolean(), z.literal('auto')]).optional(),
    sameSite: z.union([z.boolean(), z.enum(['lax', 'strict', 'none'])]).optional(),
  }),
  userId: z.number().int().optional(),
  flash: z
    .array(
      z.object({
        level: z.enum(['success', 'info', 'warning', 'error']),
        message: z.string(),
      })
    )
    .optional(),
});

// express-session turns this plain shape back into a Cookie when it loads a session
function isStoredSession(value: unknown): value is SessionData {
  return storedSessionSchema.safeParse(value).success;
}

function expiresAt(data: SessionData): number {
  const expires = data.cookie.expires;
  return expires instanceof Date ? expires.getTime() : Date.now() + DEFAULT_TTL_MS;
}

/** express-session store on the sessions table. */
export class SqliteSessionStore extends Store {
  constructor(private readonly sessions: SessionRepository) {
    super();
  }

  override get(sid: string, callback: (err: unknown, session?: SessionData | null) => void): void {
    try {
      const raw = this.sessions.find(sid);
      if (raw === null) {
        callback(null, null);
        return;
      }
      const stored: unknown = JSON.parse(raw);
      if (!isStoredSession(stored)) {
        warn('session:corrupt', { sid_prefix: sid.slice(0, 8) });
        this.sessions.delete(sid);
        callback(null, null);
        return;
      }
      callback(null, stored);
    } catch (error) {
      callback(error);
    }
  }

  override set(sid: string, data: SessionData, callback?: (err?: unknown) => void): void {
    try {
      this.sessions.upsert(sid, JSON.stringify(data), expiresAt(data));
      callback?.();
    } catch (error) {
      callback?.(error);
    }
  }

  override destroy(sid: string, callback?: (err?: unknown) => void): void {
    try {
      this.sessions.delete(sid);
      callback?.();
    } catch (error) {
      callback?.(error);
    }
  }

  override touch(sid: string, data: SessionData, callback?: (err?: unknown) => void): void {
    try {
      this.sessions.touch(sid, expiresAt(data));
      callback?.();
    } catch (error) {
      callback?.(error);
    }
  }

  /** Drop expired rows; returns how many went. */
  prune(): number {
    return this.sessions.deleteExpired();
  }
}

export interface SessionOptions {
  secret: string;
  secureCookies: boolean;
}

export function createSessionMiddleware(
  store: SqliteSessionStore,
  options: SessionOptions
): RequestHandler {
  return session({
    name: SESSION_COOKIE_NAME,
    secret: options.secret,
    store,
    resave: false,
    saveUninitialized: false,
    cookie: {
      httpOnly: true,
      sameSite: 'lax',
      secure: options.secureCookies,
      maxAge: SESSION_MAX_AGE_MS,
    },
  });
}

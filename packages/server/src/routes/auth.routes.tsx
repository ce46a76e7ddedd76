import { Router, type NextFunction, type Request, type Response } from 'express';
import {
  changePasswordSchema,
  createSuccessResponse,
  loginSchema,
  registerSchema,
  updateProfileSchema,
} from '@magic-chef/shared';
import { currentUser, endSession, requireAuth, startSession } from '../middleware/auth.js';
import { addFlash } from '../middleware/flash.js';
import { redirectTo, responseMode } from '../middleware/htmx.js';
import type { AuthService } from '../services/index.js';
import { LoginPage, RegisterPage } from '../views/pages/AuthPages.js';
import { SettingsPage } from '../views/pages/SettingsPage.js';
import { failBack, safeRedirectTarget, sendPage } from './helpers.js';

export function createAuthRouter(auth: AuthService): Router {
  const router = Router();

  // GET /auth/login
  router.get('/login', (req: Request, res: Response): void => {
    if (req.user) {
      res.redirect(303, '/');
      return;
    }
    sendPage(req, res, 'Log in', <LoginPage next={safeRedirectTarget(req.query['next'])} />);
  });

  // POST /auth/login
  router.post('/login', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = loginSchema.parse(req.body);
      const user = await auth.login(input.username, input.password);
      await startSession(req, user);

      if (responseMode(req) === 'json') {
        res.json(createSuccessResponse(user));
        return;
      }
      addFlash(req, 'success', `Welcome back, ${user.username}`);
      const target: unknown = req.body?.next;
      redirectTo(req, res, safeRedirectTarget(target));
    } catch (error) {
      failBack(req, res, next, error, '/auth/login');
    }
  });

  // GET /auth/register
  router.get('/register', (req: Request, res: Response): void => {
    sendPage(req, res, 'Register', <RegisterPage />);
  });

  // POST /auth/register
  router.post('/register', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = registerSchema.parse(req.body);
      const user = await auth.register(input);

      if (responseMode(req) === 'json') {
        res.status(201).json(createSuccessResponse(user));
        return;
      }
      addFlash(req, 'success', 'Your account was created. Please log in.');
      redirectTo(req, res, '/auth/login');
    } catch (error) {
      failBack(req, res, next, error, '/auth/register');
    }
  });

  // POST /auth/logout
  router.post('/logout', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await endSession(req);
      if (responseMode(req) === 'json') {
        res.json(createSuccessResponse({ logged_out: true }));
        return;
      }
      redirectTo(req, res, '/auth/login');
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export function createSettingsRouter(auth: AuthService): Router {
  const router = Router();
  router.use(requireAuth);

  // GET /settings
  router.get('/', (req: Request, res: Response): void => {
    sendPage(req, res, 'Settings', <SettingsPage user={currentUser(req)} />);
  });

  // POST /settings
  router.post('/', (req: Request, res: Response, next: NextFunction): void => {
    try {
      const user = auth.updateProfile(currentUser(req).id, updateProfileSchema.parse(req.body));
      if (responseMode(req) === 'json') {
        res.json(createSuccessResponse(user));
        return;
      }
      addFlash(req, 'success', 'Profile saved');
      redirectTo(req, res, '/settings');
    } catch (error) {
      failBack(req, res, next, error, '/settings');
    }
  });

  // POST /settings/password
  router.post('/password', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await auth.changePassword(currentUser(req).id, changePasswordSchema.parse(req.body));
      if (responseMode(req) === 'json') {
        res.json(createSuccessResponse({ password_changed: true }));
        return;
      }
      addFlash(req, 'success', 'Password changed');
      redirectTo(req, res, '/settings');
    } catch (error) {
      failBack(req, res, next, error, '/settings');
    }
  });

  return router;
}

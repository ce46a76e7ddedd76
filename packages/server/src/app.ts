import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import type { Database } from 'better-sqlite3';
import { info } from 'firebase-functions/logger';
import { APP_NAME, APP_VERSION, createSuccessResponse } from '@magic-chef/shared';
import type { AppConfig } from './config.js';
import { loadUser } from './middleware/auth.js';
import { errorHandler } from './middleware/error-handler.js';
import { requestLogger } from './middleware/request-logger.js';
import { SqliteSessionStore, createSessionMiddleware } from './middleware/session.js';
import { LOCAL_UPLOADS_URL_PREFIX, type Providers } from './providers/index.js';
import { createApiRouter } from './routes/api.routes.js';
import { createAuthRouter, createSettingsRouter } from './routes/auth.routes.js';
import { createPageRouter } from './routes/page.routes.js';
import { createRecipeRouter } from './routes/recipe.routes.js';
import { createSearchRouter } from './routes/search.routes.js';
import { createServices } from './services/index.js';
import { AppError } from './types/errors.js';

export interface AppDependencies {
  config: AppConfig;
  db: Database;
  providers: Providers;
}

export function createApp({ config, db, providers }: AppDependencies): Express {
  const services = createServices(db, providers);
  const sessionStore = new SqliteSessionStore(services.repositories.sessions);
  const pruned = sessionStore.prune();
  if (pruned > 0) {
    info('session:pruned', { count: pruned });
  }

  const app = express();
  if (config.env === 'production') {
    app.set('trust proxy', 1);
  }

  // htmx and the stylesheet come from unpkg; hx-on handlers need eval
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          scriptSrc: ["'self'", 'https://unpkg.com', "'unsafe-eval'"],
          styleSrc: ["'self'", 'https://unpkg.com', "'unsafe-inline'"],
          imgSrc: ["'self'", 'data:', 'https://storage.googleapis.com'],
        },
      },
    })
  );
  app.use(requestLogger);
  app.use(express.urlencoded({ extended: false, limit: '1mb' }));
  app.use(express.json({ limit: '1mb' }));
  app.use(
    createSessionMiddleware(sessionStore, {
      secret: config.sessionSecret,
      secureCookies: config.env === 'production',
    })
  );
  app.use(loadUser(services.auth));

  if (config.storage.provider === 'local') {
    app.use(LOCAL_UPLOADS_URL_PREFIX, express.static(config.storage.uploadDir, { fallthrough: false }));
  }

  app.get('/api/health', (_req: Request, res: Response): void => {
    res.json(createSuccessResponse({ name: APP_NAME, version: APP_VERSION }));
  });
  app.use('/api', createApiRouter(services.recipes));
  app.use('/auth', createAuthRouter(services.auth));
  app.use('/settings', createSettingsRouter(services.auth));
  app.use('/recipes', createRecipeRouter(services, config));
  app.use('/search', createSearchRouter(services.search));
  app.use('/', createPageRouter(services.recipes, config));

  app.use((req: Request, _res: Response, next: NextFunction): void => {
    next(new AppError(404, 'NOT_FOUND', `No page at ${req.path}`));
  });
  app.use(errorHandler);

  return app;
}

import { Router, type NextFunction, type Request, type Response } from 'express';
import {
  bulkDeleteFormSchema,
  bulkDeleteSchema,
  bulkTagFormSchema,
  bulkTagSchema,
  createSuccessResponse,
  recipeExportQuerySchema,
  recipeTableQuerySchema,
} from '@magic-chef/shared';
import type { AppConfig } from '../config.js';
import { currentUser, requireAuth } from '../middleware/auth.js';
import { addFlash } from '../middleware/flash.js';
import { redirectTo, responseMode } from '../middleware/htmx.js';
import { recipesToCsv, type RecipeService } from '../services/index.js';
import { AiPage } from '../views/pages/AiPage.js';
import { DigitiserPage } from '../views/pages/DigitiserPage.js';
import { HomePage } from '../views/pages/HomePage.js';
import { TablePage } from '../views/pages/TablePage.js';
import { failBack, parseBody, sendPage } from './helpers.js';

export function createPageRouter(recipes: RecipeService, config: AppConfig): Router {
  const router = Router();

  // GET /
  router.get('/', (req: Request, res: Response): void => {
    const user = req.user ?? null;
    const list = user ? recipes.listForUser(user.id, 'updated_at', 'desc') : [];
    sendPage(req, res, 'My recipes', <HomePage user={user} recipes={list} />);
  });

  // GET /ai
  router.get('/ai', requireAuth, (req: Request, res: Response): void => {
    sendPage(req, res, 'AI chef', <AiPage />);
  });

  // GET /digitiser
  router.get('/digitiser', requireAuth, (req: Request, res: Response): void => {
    sendPage(req, res, 'Digitiser', <DigitiserPage maxUploadBytes={config.ocr.maxUploadBytes} />);
  });

  // GET /table
  router.get('/table', requireAuth, (req: Request, res: Response): void => {
    const { sort, order } = recipeTableQuerySchema.parse(req.query);
    const list = recipes.listForUser(currentUser(req).id, sort, order);
    sendPage(req, res, 'Table', <TablePage recipes={list} sort={sort} order={order} />);
  });

  // GET /table/export.csv
  router.get('/table/export.csv', requireAuth, (req: Request, res: Response): void => {
    const { ids } = recipeExportQuerySchema.parse(req.query);
    const csv = recipesToCsv(recipes.listForExport(currentUser(req).id, ids));
    res.type('text/csv').attachment('recipes_export.csv').send(csv);
  });

  // POST /table/bulk-delete
  router.post('/table/bulk-delete', requireAuth, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = parseBody(req, bulkDeleteSchema, bulkDeleteFormSchema);
      const deleted = await recipes.bulkDelete(currentUser(req).id, input.recipe_ids);
      if (responseMode(req) === 'json') {
        res.json(createSuccessResponse({ deleted }));
        return;
      }
      addFlash(req, 'success', `Deleted ${deleted} ${deleted === 1 ? 'recipe' : 'recipes'}`);
      redirectTo(req, res, '/table');
    } catch (error) {
      failBack(req, res, next, error, '/table');
    }
  });

  // POST /table/bulk-tag
  router.post('/table/bulk-tag', requireAuth, (req: Request, res: Response, next: NextFunction): void => {
    try {
      const input = parseBody(req, bulkTagSchema, bulkTagFormSchema);
      const tagged = recipes.bulkTag(currentUser(req).id, input.recipe_ids, input.tag);
      if (responseMode(req) === 'json') {
        res.json(createSuccessResponse({ tagged }));
        return;
      }
      addFlash(req, 'success', `Tagged ${tagged} ${tagged === 1 ? 'recipe' : 'recipes'} with "${input.tag}"`);
      redirectTo(req, res, '/table');
    } catch (error) {
      failBack(req, res, next, error, '/table');
    }
  });

  return router;
}

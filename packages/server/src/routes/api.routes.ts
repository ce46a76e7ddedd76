import { Router, type NextFunction, type Request, type Response } from 'express';
import {
  createRecipeSchema,
  createSuccessResponse,
  recipeTableQuerySchema,
  updateRecipeSchema,
  type ApiResponse,
  type CreateRecipeDTO,
  type Recipe,
  type RecipeWithDetails,
  type UpdateRecipeDTO,
} from '@magic-chef/shared';
import { asyncHandler } from '../middleware/async-handler.js';
import { currentUser, requireAuth } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import type { RecipeService } from '../services/index.js';
import { parseId } from './helpers.js';

/** JSON CRUD under /api/recipes. */
export function createApiRouter(recipes: RecipeService): Router {
  const router = Router();

  // GET /api/recipes
  router.get('/recipes', requireAuth, (req: Request, res: Response, next: NextFunction): void => {
    try {
      const { sort, order } = recipeTableQuerySchema.parse(req.query);
      const response: ApiResponse<Recipe[]> = createSuccessResponse(
        recipes.listForUser(currentUser(req).id, sort, order)
      );
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  // POST /api/recipes
  router.post(
    '/recipes',
    requireAuth,
    validate(createRecipeSchema),
    (req: Request<Record<string, string>, unknown, CreateRecipeDTO>, res: Response, next: NextFunction): void => {
      try {
        const recipe = recipes.create(currentUser(req).id, req.body);
        const response: ApiResponse<RecipeWithDetails> = createSuccessResponse(recipe);
        res.status(201).json(response);
      } catch (error) {
        next(error);
      }
    }
  );

  // GET /api/recipes/:id
  router.get('/recipes/:id', (req: Request, res: Response, next: NextFunction): void => {
    try {
      const recipe = recipes.get(req.user?.id ?? null, parseId(req.params['id'], 'Recipe'));
      res.json(createSuccessResponse(recipe));
    } catch (error) {
      next(error);
    }
  });

  // PUT /api/recipes/:id
  router.put(
    '/recipes/:id',
    requireAuth,
    validate(updateRecipeSchema),
    (req: Request<Record<string, string>, unknown, UpdateRecipeDTO>, res: Response, next: NextFunction): void => {
      try {
        const recipe = recipes.update(currentUser(req).id, parseId(req.params['id'], 'Recipe'), req.body);
        res.json(createSuccessResponse(recipe));
      } catch (error) {
        next(error);
      }
    }
  );

  // DELETE /api/recipes/:id
  router.delete(
    '/recipes/:id',
    requireAuth,
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const id = parseId(req.params['id'], 'Recipe');
      await recipes.delete(currentUser(req).id, id);
      res.json(createSuccessResponse({ id }));
    })
  );

  // POST /api/recipes/:id/copy
  router.post('/recipes/:id/copy', requireAuth, (req: Request, res: Response, next: NextFunction): void => {
    try {
      const copy = recipes.copy(currentUser(req).id, parseId(req.params['id'], 'Recipe'));
      res.status(201).json(createSuccessResponse(copy));
    } catch (error) {
      next(error);
    }
  });

  return router;
}

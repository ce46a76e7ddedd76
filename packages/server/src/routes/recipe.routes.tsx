import { Router, type NextFunction, type Request, type Response } from 'express';
import {
  createRecipeSchema,
  createSuccessResponse,
  generateIdeasFormSchema,
  generateIdeasSchema,
  generateRecipeFormSchema,
  generateRecipeSchema,
  recipeFormSchema,
  translateRecipeSchema,
  type RecipeWithDetails,
} from '@magic-chef/shared';
import type { AppConfig } from '../config.js';
import { currentUser, requireAuth } from '../middleware/auth.js';
import { addFlash } from '../middleware/flash.js';
import { redirectTo, responseMode } from '../middleware/htmx.js';
import { IMAGE_CONTENT_TYPES, OCR_CONTENT_TYPES, singleUpload } from '../middleware/upload.js';
import type { Services, UploadedImage } from '../services/index.js';
import { ImageBlock } from '../views/components/ImageBlock.js';
import { DishIdeas } from '../views/components/DishIdeas.js';
import { StepRow } from '../views/components/StepRow.js';
import { emptyFormValues, formValuesFromRecipe } from '../views/components/RecipeForm.js';
import { OcrResultView } from '../views/pages/OcrResultView.js';
import { RecipeDetailPage } from '../views/pages/RecipeDetailPage.js';
import { RecipeFormPage } from '../views/pages/RecipeFormPage.js';
import { failBack, parseBody, parseId, sendPage, sendPartial } from './helpers.js';

/**
 * Recipe pages, HTMX actions and the generation, translation and OCR
 * endpoints. Each action answers JSON callers with an ApiResponse and
 * browsers with a redirect or fragment.
 */
export function createRecipeRouter(services: Services, config: AppConfig): Router {
  const router = Router();
  const { recipes, images, generation, translation, ocr } = services;

  const imageUpload = singleUpload({
    field: 'image',
    maxBytes: config.images.maxUploadBytes,
    allowedTypes: IMAGE_CONTENT_TYPES,
    required: false,
  });
  const requiredImageUpload = singleUpload({
    field: 'image',
    maxBytes: config.images.maxUploadBytes,
    allowedTypes: IMAGE_CONTENT_TYPES,
    required: true,
  });
  const ocrUpload = singleUpload({
    field: 'image',
    maxBytes: config.ocr.maxUploadBytes,
    allowedTypes: OCR_CONTENT_TYPES,
    required: true,
  });

  function uploadedImage(req: Request, altText: string | undefined): UploadedImage | undefined {
    return req.file ? { data: req.file.buffer, contentType: req.file.mimetype, altText } : undefined;
  }

  function respondWithRecipe(
    req: Request,
    res: Response,
    recipe: RecipeWithDetails,
    status: number,
    flash: string
  ): void {
    if (responseMode(req) === 'json') {
      res.status(status).json(createSuccessResponse(recipe));
      return;
    }
    addFlash(req, 'success', flash);
    redirectTo(req, res, `/recipes/${recipe.id}`);
  }

  // GET /recipes/new
  router.get('/new', requireAuth, (req: Request, res: Response): void => {
    const user = currentUser(req);
    sendPage(req, res, 'New recipe', <RecipeFormPage mode="new" values={emptyFormValues(user.language)} />);
  });

  // GET /recipes/steps/new - one empty step row for the form
  router.get('/steps/new', (_req: Request, res: Response): void => {
    sendPartial(res, <StepRow />);
  });

  // POST /recipes
  router.post('/', requireAuth, imageUpload, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = parseBody(req, createRecipeSchema, recipeFormSchema);
      const created = await recipes.createWithUpload(currentUser(req).id, input, uploadedImage(req, input.title));
      respondWithRecipe(req, res, created, 201, 'Recipe created');
    } catch (error) {
      failBack(req, res, next, error, '/recipes/new');
    }
  });

  // POST /recipes/generate
  router.post('/generate', requireAuth, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = parseBody(req, generateRecipeSchema, generateRecipeFormSchema);
      const recipe = await generation.generate(currentUser(req).id, input);
      respondWithRecipe(req, res, recipe, 201, 'Your recipe is ready');
    } catch (error) {
      failBack(req, res, next, error, '/ai');
    }
  });

  // POST /recipes/ideas
  router.post('/ideas', requireAuth, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = parseBody(req, generateIdeasSchema, generateIdeasFormSchema);
      const ideas = await generation.generateIdeas(input);
      if (responseMode(req) === 'json') {
        res.json(createSuccessResponse(ideas));
        return;
      }
      sendPartial(res, <DishIdeas ideas={ideas} />);
    } catch (error) {
      next(error);
    }
  });

  // POST /recipes/ocr
  router.post('/ocr', requireAuth, ocrUpload, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      if (!req.file) {
        throw new Error('Upload middleware let a request without a file through');
      }
      const result = await ocr.digitise({ data: req.file.buffer, contentType: req.file.mimetype });
      if (responseMode(req) === 'json') {
        res.json(createSuccessResponse(result));
        return;
      }
      sendPartial(res, <OcrResultView result={result} language={currentUser(req).language} />);
    } catch (error) {
      next(error);
    }
  });

  // GET /recipes/:id
  router.get('/:id', (req: Request, res: Response, next: NextFunction): void => {
    try {
      const viewerId = req.user?.id ?? null;
      const recipe = recipes.get(viewerId, parseId(req.params['id'], 'Recipe'));
      if (responseMode(req) === 'json') {
        res.json(createSuccessResponse(recipe));
        return;
      }
      sendPage(
        req,
        res,
        recipe.title,
        <RecipeDetailPage
          recipe={recipe}
          images={recipe.images.map((image) => images.withUrl(image))}
          isOwner={recipe.user_id === viewerId}
          loggedIn={viewerId !== null}
        />
      );
    } catch (error) {
      next(error);
    }
  });

  // GET /recipes/:id/edit
  router.get('/:id/edit', requireAuth, (req: Request, res: Response, next: NextFunction): void => {
    try {
      const recipe = recipes.getOwned(currentUser(req).id, parseId(req.params['id'], 'Recipe'));
      sendPage(
        req,
        res,
        `Edit ${recipe.title}`,
        <RecipeFormPage
          mode="edit"
          recipeId={recipe.id}
          values={formValuesFromRecipe(recipe)}
          images={recipe.images.map((image) => images.withUrl(image))}
        />
      );
    } catch (error) {
      next(error);
    }
  });

  // POST /recipes/:id
  router.post('/:id', requireAuth, imageUpload, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const id = req.params['id'];
    try {
      const input = parseBody(req, createRecipeSchema, recipeFormSchema);
      const updated = await recipes.updateWithUpload(
        currentUser(req).id,
        parseId(id, 'Recipe'),
        input,
        uploadedImage(req, input.title)
      );
      respondWithRecipe(req, res, updated, 200, 'Recipe saved');
    } catch (error) {
      failBack(req, res, next, error, `/recipes/${id ?? ''}/edit`);
    }
  });

  // POST /recipes/:id/delete
  router.post('/:id/delete', requireAuth, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const id = parseId(req.params['id'], 'Recipe');
      await recipes.delete(currentUser(req).id, id);
      if (responseMode(req) === 'json') {
        res.json(createSuccessResponse({ id }));
        return;
      }
      addFlash(req, 'success', 'Recipe deleted');
      redirectTo(req, res, '/');
    } catch (error) {
      next(error);
    }
  });

  // POST /recipes/:id/copy
  router.post('/:id/copy', requireAuth, (req: Request, res: Response, next: NextFunction): void => {
    try {
      const copy = recipes.copy(currentUser(req).id, parseId(req.params['id'], 'Recipe'));
      respondWithRecipe(req, res, copy, 201, 'Recipe saved to your collection');
    } catch (error) {
      next(error);
    }
  });

  // POST /recipes/:id/translate
  router.post('/:id/translate', requireAuth, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { target_lang } = translateRecipeSchema.parse(req.body);
      const translated = await translation.translate(
        currentUser(req).id,
        parseId(req.params['id'], 'Recipe'),
        target_lang
      );
      respondWithRecipe(req, res, translated, 201, 'Translation saved as a new recipe');
    } catch (error) {
      next(error);
    }
  });

  // POST /recipes/:id/images
  router.post('/:id/images', requireAuth, requiredImageUpload, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = currentUser(req);
      const recipeId = parseId(req.params['id'], 'Recipe');
      if (!req.file) {
        throw new Error('Upload middleware let a request without a file through');
      }
      const image = await images.upload(user.id, recipeId, {
        data: req.file.buffer,
        contentType: req.file.mimetype,
      });
      if (responseMode(req) === 'json') {
        res.status(201).json(createSuccessResponse(images.withUrl(image)));
        return;
      }
      redirectTo(req, res, `/recipes/${recipeId}/edit`);
    } catch (error) {
      next(error);
    }
  });

  // POST /recipes/:id/images/:imageId/delete
  router.post('/:id/images/:imageId/delete', requireAuth, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = currentUser(req);
      const recipeId = await images.delete(user.id, parseId(req.params['imageId'], 'Image'));
      const remaining = recipes.getOwned(user.id, recipeId).images.map((image) => images.withUrl(image));

      switch (responseMode(req)) {
        case 'json':
          res.json(createSuccessResponse(remaining));
          return;
        case 'htmx':
          sendPartial(res, <ImageBlock recipeId={recipeId} images={remaining} editable={true} />);
          return;
        case 'html':
          redirectTo(req, res, `/recipes/${recipeId}/edit`);
          return;
      }
    } catch (error) {
      next(error);
    }
  });

  return router;
}

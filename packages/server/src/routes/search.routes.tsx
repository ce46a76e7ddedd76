import { Router, type NextFunction, type Request, type Response } from 'express';
import { createSuccessResponse, recipeSearchSchema, type RecipeSearchQuery } from '@magic-chef/shared';
import { responseMode } from '../middleware/htmx.js';
import type { SearchService } from '../services/index.js';
import { SearchResults } from '../views/components/SearchResults.js';
import { TagList } from '../views/components/TagList.js';
import { SearchPage } from '../views/pages/SearchPage.js';
import { sendPage, sendPartial } from './helpers.js';

function readQuery(req: Request): RecipeSearchQuery {
  const query = recipeSearchSchema.parse({
    q: typeof req.query['q'] === 'string' ? req.query['q'] : undefined,
    tag: typeof req.query['tag'] === 'string' ? req.query['tag'] : undefined,
    ingredient: typeof req.query['ingredient'] === 'string' ? req.query['ingredient'] : undefined,
  });
  return {
    q: query.q || undefined,
    tag: query.tag || undefined,
    ingredient: query.ingredient || undefined,
  };
}

/** Search is open to everyone; anonymous visitors only see public recipes. */
export function createSearchRouter(search: SearchService): Router {
  const router = Router();

  // GET /search
  router.get('/', (req: Request, res: Response, next: NextFunction): void => {
    try {
      const query = readQuery(req);
      const results = search.search(query, req.user?.id ?? null);
      sendPage(req, res, 'Search', <SearchPage query={query} results={results} />);
    } catch (error) {
      next(error);
    }
  });

  // GET /search/results
  router.get('/results', (req: Request, res: Response, next: NextFunction): void => {
    try {
      const query = readQuery(req);
      const results = search.search(query, req.user?.id ?? null);
      if (responseMode(req) === 'json') {
        res.json(createSuccessResponse(results));
        return;
      }
      sendPartial(res, <SearchResults query={query} results={results} />);
    } catch (error) {
      next(error);
    }
  });

  // GET /search/tags
  router.get('/tags', (req: Request, res: Response, next: NextFunction): void => {
    try {
      const tags = search.listTags(req.user?.id ?? null);
      if (responseMode(req) === 'json') {
        res.json(createSuccessResponse(tags));
        return;
      }
      sendPartial(res, <TagList tags={tags} />);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

import type { Database } from 'better-sqlite3';
import { createRepositories, type Repositories } from '../repositories/index.js';
import type { Providers } from '../providers/index.js';
import { AuthService } from './auth.service.js';
import { GenerationService } from './generation.service.js';
import { ImageService } from './image.service.js';
import { OcrService } from './ocr.service.js';
import { RecipeService } from './recipe.service.js';
import { SearchService } from './search.service.js';
import { TranslationService } from './translation.service.js';

export { AuthService } from './auth.service.js';
export { GenerationService } from './generation.service.js';
export { ImageService, IMAGE_EXTENSIONS } from './image.service.js';
export type { RecipeImageView, UploadedImage } from './image.service.js';
export { OcrService } from './ocr.service.js';
export { RecipeService } from './recipe.service.js';
export { recipesToCsv } from './recipe-csv.js';
export { SearchService } from './search.service.js';
export { TranslationService } from './translation.service.js';
export { parseRecipeDraft } from './recipe-draft.js';
export { hashPassword, verifyPassword } from './password.js';

export interface Services {
  repositories: Repositories;
  auth: AuthService;
  recipes: RecipeService;
  images: ImageService;
  search: SearchService;
  generation: GenerationService;
  translation: TranslationService;
  ocr: OcrService;
}

export function createServices(db: Database, providers: Providers): Services {
  const repositories = createRepositories(db);
  const images = new ImageService(repositories.recipes, repositories.images, providers.storage);
  const recipes = new RecipeService(repositories.recipes, repositories.images, images);

  return {
    repositories,
    auth: new AuthService(repositories.users),
    recipes,
    images,
    search: new SearchService(repositories.recipes, repositories.search, repositories.tags),
    generation: new GenerationService(providers.llm, repositories.recipes, repositories.users),
    translation: new TranslationService(providers.translation, repositories.recipes, recipes),
    ocr: new OcrService(providers.ocr, providers.llm),
  };
}

import type { Database } from 'better-sqlite3';
import { UserRepository } from './user.repository.js';
import { RecipeRepository } from './recipe.repository.js';
import { RecipeStepRepository } from './recipe-step.repository.js';
import { TagRepository } from './tag.repository.js';
import { RecipeImageRepository } from './recipe-image.repository.js';
import { RecipeSearchRepository } from './recipe-search.repository.js';
import { SessionRepository } from './session.repository.js';

export { UserRepository } from './user.repository.js';
export type { CreateUserData, UpdateProfileData } from './user.repository.js';
export { RecipeRepository } from './recipe.repository.js';
export type { CreateRecipeOptions } from './recipe.repository.js';
export { RecipeStepRepository } from './recipe-step.repository.js';
export { TagRepository } from './tag.repository.js';
export type { Tag } from './tag.repository.js';
export { RecipeImageRepository } from './recipe-image.repository.js';
export type { CreateRecipeImageData, StoredImage } from './recipe-image.repository.js';
export { RecipeSearchRepository, toMatchQuery } from './recipe-search.repository.js';
export { SessionRepository } from './session.repository.js';

export interface Repositories {
  users: UserRepository;
  recipes: RecipeRepository;
  steps: RecipeStepRepository;
  tags: TagRepository;
  images: RecipeImageRepository;
  search: RecipeSearchRepository;
  sessions: SessionRepository;
}

export function createRepositories(db: Database): Repositories {
  return {
    users: new UserRepository(db),
    recipes: new RecipeRepository(db),
    steps: new RecipeStepRepository(db),
    tags: new TagRepository(db),
    images: new RecipeImageRepository(db),
    search: new RecipeSearchRepository(db),
    sessions: new SessionRepository(db),
  };
}

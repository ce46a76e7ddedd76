import type { Migration } from '../migrator.js';
import { migration as createUsers } from './001_create_users.js';
import { migration as createRecipes } from './002_create_recipes.js';
import { migration as createTags } from './003_create_tags.js';
import { migration as createRecipeImages } from './004_create_recipe_images.js';
import { migration as createRecipesFts } from './005_create_recipes_fts.js';
import { migration as createSessions } from './006_create_sessions.js';

export const migrations: Migration[] = [
  createUsers,
  createRecipes,
  createTags,
  createRecipeImages,
  createRecipesFts,
  createSessions,
];

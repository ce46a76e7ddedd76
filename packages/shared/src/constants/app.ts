export const APP_NAME = 'Magic Chef';
export const APP_VERSION = '1.0.0';

// Diets the generator understands; 'none' means no constraint
export const DIETS = [
  'none',
  'vegetarian',
  'vegan',
  'pescatarian',
  'gluten-free',
  'dairy-free',
] as const;

export type Diet = (typeof DIETS)[number];

export const RECIPE_SORT_FIELDS = ['title', 'servings', 'created_at', 'updated_at'] as const;
export type RecipeSortField = (typeof RECIPE_SORT_FIELDS)[number];

export const SORT_ORDERS = ['asc', 'desc'] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

export const AI_GENERATED_TAG = 'ai-generated';
export const MAX_DISH_IDEAS = 20;

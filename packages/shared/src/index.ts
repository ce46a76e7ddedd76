export * from './constants/app.js';
export * from './constants/languages.js';
export * from './types/api.js';
export * from './types/user.js';
export * from './types/recipe.js';
export * from './schemas/common.schema.js';
export * from './schemas/recipe.schema.js';
export * from './schemas/auth.schema.js';
export * from './schemas/generation.schema.js';
export * from './schemas/translation.schema.js';

import { z } from 'zod';
import { DIETS, MAX_DISH_IDEAS } from '../constants/app.js';
import { isCheckboxOn, parseIntOrNaN, splitList } from './common.schema.js';

export const dietSchema = z.enum(DIETS);

const ingredientListSchema = z
  .array(z.string().trim().min(1).max(100))
  .min(1, 'Please enter at least one ingredient')
  .max(50);

export const generateRecipeSchema = z.object({
  ingredients: ingredientListSchema,
  servings: z.number().int().positive().max(50),
  diet: dietSchema.default('none'),
  title: z.string().trim().min(1).max(200).optional(),
  use_only: z.boolean().default(false),
});

export const generateIdeasSchema = z.object({
  ingredients: ingredientListSchema,
  diet: dietSchema.default('none'),
  use_only: z.boolean().default(false),
  count: z.number().int().min(1).max(MAX_DISH_IDEAS).default(10),
});

/** The generator page posts a plain form through htmx. */
export const generateRecipeFormSchema = z
  .object({
    ingredients: z.string().default(''),
    servings: z.string().default('4'),
    diet: z.string().default('none'),
    title: z.string().optional(),
    use_only: z.string().optional(),
  })
  .transform((form) => ({
    ingredients: splitList(form.ingredients),
    servings: parseIntOrNaN(form.servings),
    diet: form.diet,
    title: form.title === undefined || form.title.trim() === '' ? undefined : form.title,
    use_only: isCheckboxOn(form.use_only),
  }))
  .pipe(generateRecipeSchema);

export const generateIdeasFormSchema = z
  .object({
    ingredients: z.string().default(''),
    diet: z.string().default('none'),
    use_only: z.string().optional(),
    count: z.string().default('10'),
  })
  .transform((form) => ({
    ingredients: splitList(form.ingredients),
    diet: form.diet,
    use_only: isCheckboxOn(form.use_only),
    count: parseIntOrNaN(form.count),
  }))
  .pipe(generateIdeasSchema);

export type GenerateRecipeInput = z.infer<typeof generateRecipeSchema>;
export type GenerateIdeasInput = z.infer<typeof generateIdeasSchema>;

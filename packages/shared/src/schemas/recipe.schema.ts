import { z } from 'zod';
import { RECIPE_SORT_FIELDS, SORT_ORDERS } from '../constants/app.js';
import {
  isCheckboxOn,
  languageSchema,
  parseIntOrNaN,
  splitLines,
  splitList,
  tagNameSchema,
} from './common.schema.js';

export const recipeIngredientSchema = z.object({
  name: z.string().trim().min(1).max(200),
  quantity: z.string().trim().max(200).default(''),
}).strict();

export const createRecipeSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(200),
  summary: z.string().trim().max(5000).default(''),
  language: languageSchema.default('en'),
  servings: z.number().int().positive().max(100).default(4),
  total_time_minutes: z.number().int().nonnegative().max(10080).nullable().default(null),
  steps: z
    .array(z.string().trim().min(1).max(2000))
    .min(1, 'At least one step is required')
    .max(200),
  ingredients: z.array(recipeIngredientSchema).max(200).default([]),
  notes: z.array(z.string().trim().min(1).max(1000)).max(50).default([]),
  tags: z.array(tagNameSchema).max(30).default([]),
  is_public: z.boolean().default(false),
});

export const updateRecipeSchema = createRecipeSchema.partial();

/**
 * "flour | 200 g" becomes { name: 'flour', quantity: '200 g' };
 * a line without a pipe is all name.
 */
export function parseIngredientLine(line: string): { name: string; quantity: string } {
  const separator = line.indexOf('|');
  if (separator === -1) {
    return { name: line.trim(), quantity: '' };
  }
  return {
    name: line.slice(0, separator).trim(),
    quantity: line.slice(separator + 1).trim(),
  };
}

export function formatIngredientLine(ingredient: { name: string; quantity: string }): string {
  return ingredient.quantity === '' ? ingredient.name : `${ingredient.name} | ${ingredient.quantity}`;
}

// Step rows post one `steps` field each; a single row arrives as a string
const stepsFieldSchema = z
  .union([z.string(), z.array(z.string())])
  .default([])
  .transform((value) =>
    (Array.isArray(value) ? value : splitLines(value))
      .map((step) => step.trim())
      .filter((step) => step.length > 0)
  );

/** Urlencoded/multipart recipe form, converted to the JSON shape. */
export const recipeFormSchema = z
  .object({
    title: z.string().default(''),
    summary: z.string().default(''),
    language: z.string().default('en'),
    servings: z.string().default('4'),
    total_time_minutes: z.string().default(''),
    steps: stepsFieldSchema,
    ingredients: z.string().default(''),
    notes: z.string().default(''),
    tags: z.string().default(''),
    is_public: z.string().optional(),
  })
  .transform((form) => ({
    title: form.title,
    summary: form.summary,
    language: form.language,
    servings: parseIntOrNaN(form.servings),
    total_time_minutes:
      form.total_time_minutes.trim() === '' ? null : parseIntOrNaN(form.total_time_minutes),
    steps: form.steps,
    ingredients: splitLines(form.ingredients).map(parseIngredientLine),
    notes: splitLines(form.notes),
    tags: splitList(form.tags),
    is_public: isCheckboxOn(form.is_public),
  }))
  .pipe(createRecipeSchema);

export const recipeSearchSchema = z.object({
  q: z.string().trim().max(200).optional(),
  tag: z.string().trim().max(50).optional(),
  ingredient: z.string().trim().max(200).optional(),
});

export const recipeTableQuerySchema = z.object({
  sort: z.enum(RECIPE_SORT_FIELDS).catch('created_at'),
  order: z.enum(SORT_ORDERS).catch('desc'),
});

export const bulkDeleteSchema = z.object({
  recipe_ids: z.array(z.number().int().positive()).min(1, 'No recipes selected').max(500),
});

export const bulkTagSchema = bulkDeleteSchema.extend({
  tag: tagNameSchema,
});

// Table checkboxes post one recipe_ids value per row; a single row arrives as a string
const idListFieldSchema = z
  .union([z.string(), z.array(z.string())])
  .default([])
  .transform((value) => (Array.isArray(value) ? value : [value]).map(parseIntOrNaN));

export const bulkDeleteFormSchema = z
  .object({ recipe_ids: idListFieldSchema })
  .pipe(bulkDeleteSchema);

// Export links carry ids as repeated params or one comma separated value
export const recipeExportQuerySchema = z.object({
  ids: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((value) => {
      if (value === undefined) {
        return undefined;
      }
      return (Array.isArray(value) ? value : [value]).flatMap(splitList).map(parseIntOrNaN);
    })
    .pipe(z.array(z.number().int().positive()).max(500).optional()),
});

export const bulkTagFormSchema = z
  .object({ recipe_ids: idListFieldSchema, tag: z.string().default('') })
  .pipe(bulkTagSchema);

export type CreateRecipeDTO = z.infer<typeof createRecipeSchema>;
export type UpdateRecipeDTO = z.infer<typeof updateRecipeSchema>;

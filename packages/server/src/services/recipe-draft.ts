import { z } from 'zod';
import type { RecipeDraft, RecipeIngredient } from '@magic-chef/shared';
import { parseJsonObject } from '../providers/index.js';

// Models answer in several shapes; accept the common ones and normalise.
const quantitySchema = z.union([z.string(), z.number()]).transform(String);

const ingredientEntrySchema = z.union([
  z.string(),
  z.object({
    name: z.string(),
    quantity: quantitySchema.optional(),
    amount: quantitySchema.optional(),
  }),
]);

const ingredientItemsSchema = z.union([
  z.array(ingredientEntrySchema),
  z.record(quantitySchema),
]);

const ingredientsFieldSchema = z.union([
  ingredientItemsSchema,
  z.object({
    servings: z.number().optional(),
    items: ingredientItemsSchema,
  }),
]);

const stepEntrySchema = z.union([z.string(), z.object({ text: z.string() })]);

const modelRecipeSchema = z.object({
  title: z.string(),
  description: z.string().optional(),
  summary: z.string().optional(),
  servings: z.number().int().positive().nullable().optional(),
  total_time_minutes: z.number().int().nonnegative().nullable().optional(),
  ingredients: ingredientsFieldSchema.optional(),
  instructions: z.array(stepEntrySchema).optional(),
  steps: z.array(stepEntrySchema).optional(),
  notes: z.union([z.array(z.string()), z.string()]).optional(),
  tags: z.array(z.string()).optional(),
});

type IngredientItems = z.infer<typeof ingredientItemsSchema>;
type IngredientsField = z.infer<typeof ingredientsFieldSchema>;

function normaliseItems(items: IngredientItems): RecipeIngredient[] {
  if (Array.isArray(items)) {
    return items.map((entry) =>
      typeof entry === 'string'
        ? { name: entry.trim(), quantity: '' }
        : { name: entry.name.trim(), quantity: (entry.quantity ?? entry.amount ?? '').trim() }
    );
  }
  return Object.entries(items).map(([name, quantity]) => ({ name: name.trim(), quantity: quantity.trim() }));
}

function isItemsWrapper(field: IngredientsField): field is Extract<IngredientsField, { items: IngredientItems }> {
  return !Array.isArray(field) && 'items' in field && typeof field.items === 'object';
}

function normaliseIngredients(field: IngredientsField | undefined): {
  ingredients: RecipeIngredient[];
  servings: number | null;
} {
  if (field === undefined) {
    return { ingredients: [], servings: null };
  }
  if (isItemsWrapper(field)) {
    return { ingredients: normaliseItems(field.items), servings: field.servings ?? null };
  }
  return { ingredients: normaliseItems(field), servings: null };
}

function nonEmpty(values: string[]): string[] {
  return values.map((value) => value.trim()).filter((value) => value.length > 0);
}

/**
 * Turn a model answer into a draft. Returns null when the answer is not
 * JSON or lacks the fields every recipe needs.
 */
export function parseRecipeDraft(content: string): RecipeDraft | null {
  const parsed = modelRecipeSchema.safeParse(parseJsonObject(content));
  if (!parsed.success) {
    return null;
  }
  const data = parsed.data;
  const { ingredients, servings } = normaliseIngredients(data.ingredients);
  const notes = typeof data.notes === 'string' ? [data.notes] : (data.notes ?? []);

  return {
    title: data.title.trim(),
    summary: (data.summary ?? data.description ?? '').trim(),
    servings: data.servings ?? servings,
    total_time_minutes: data.total_time_minutes ?? null,
    ingredients: ingredients.filter((ingredient) => ingredient.name.length > 0),
    steps: nonEmpty((data.steps ?? data.instructions ?? []).map((step) => (typeof step === 'string' ? step : step.text))),
    notes: nonEmpty(notes),
    tags: nonEmpty(data.tags ?? []),
  };
}

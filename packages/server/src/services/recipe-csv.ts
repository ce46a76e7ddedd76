import { stringify } from 'csv-stringify/sync';
import type { RecipeWithDetails } from '@magic-chef/shared';

const COLUMNS = [
  { key: 'title', header: 'Title' },
  { key: 'summary', header: 'Summary' },
  { key: 'servings', header: 'Servings' },
  { key: 'ingredients', header: 'Ingredients' },
  { key: 'steps', header: 'Steps' },
  { key: 'notes', header: 'Notes' },
  { key: 'tags', header: 'Tags' },
  { key: 'created', header: 'Created' },
  { key: 'updated', header: 'Updated' },
];

/** One row per recipe; ingredients and steps are counted, dates cut to the day. */
export function recipesToCsv(recipes: readonly RecipeWithDetails[]): string {
  const rows = recipes.map((recipe) => ({
    title: recipe.title,
    summary: recipe.summary,
    servings: recipe.servings,
    ingredients: recipe.ingredients.length,
    steps: recipe.steps.length,
    notes: recipe.notes.join('; '),
    tags: recipe.tags.join(', '),
    created: recipe.created_at.slice(0, 10),
    updated: recipe.updated_at.slice(0, 10),
  }));
  return stringify(rows, { header: true, columns: COLUMNS });
}

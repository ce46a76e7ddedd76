import { describe, expect, it } from 'vitest';
import {
  bulkDeleteFormSchema,
  bulkTagFormSchema,
  createRecipeSchema,
  formatIngredientLine,
  parseIngredientLine,
  recipeExportQuerySchema,
  recipeFormSchema,
  recipeTableQuerySchema,
  updateRecipeSchema,
} from './recipe.schema.js';

describe('createRecipeSchema', () => {
  it('fills in defaults for a minimal recipe', () => {
    const result = createRecipeSchema.safeParse({ title: '  Pancakes ', steps: ['Mix', 'Fry'] });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        title: 'Pancakes',
        summary: '',
        language: 'en',
        servings: 4,
        total_time_minutes: null,
        steps: ['Mix', 'Fry'],
        ingredients: [],
        notes: [],
        tags: [],
        is_public: false,
      });
    }
  });

  it('normalizes tag names', () => {
    const result = createRecipeSchema.safeParse({ title: 'Stew', steps: ['Cook'], tags: ['  One   Pot '] });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.tags).toEqual(['one pot']);
    }
  });

  it('rejects a blank title and an empty step list', () => {
    const result = createRecipeSchema.safeParse({ title: '   ', steps: [] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual([
        'Title is required',
        'At least one step is required',
      ]);
    }
  });

  it('rejects unsupported languages and non-positive servings', () => {
    expect(createRecipeSchema.safeParse({ title: 'A', steps: ['B'], language: 'xx' }).success).toBe(false);
    expect(createRecipeSchema.safeParse({ title: 'A', steps: ['B'], servings: 0 }).success).toBe(false);
  });

  it('rejects unknown ingredient fields', () => {
    const result = createRecipeSchema.safeParse({
      title: 'A',
      steps: ['B'],
      ingredients: [{ name: 'salt', quantity: '1 tsp', unit: 'tsp' }],
    });

    expect(result.success).toBe(false);
  });
});

describe('updateRecipeSchema', () => {
  it('accepts a partial update without applying defaults to missing fields', () => {
    const result = updateRecipeSchema.safeParse({ servings: 2 });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.servings).toBe(2);
      expect(result.data.title).toBeUndefined();
    }
  });
});

describe('ingredient lines', () => {
  it('splits name and quantity on the first pipe', () => {
    expect(parseIngredientLine(' flour | 200 g ')).toEqual({ name: 'flour', quantity: '200 g' });
    expect(parseIngredientLine('salt')).toEqual({ name: 'salt', quantity: '' });
  });

  it('formats an ingredient back into a line', () => {
    expect(formatIngredientLine({ name: 'flour', quantity: '200 g' })).toBe('flour | 200 g');
    expect(formatIngredientLine({ name: 'salt', quantity: '' })).toBe('salt');
  });
});

describe('recipeFormSchema', () => {
  it('converts form fields into the recipe shape', () => {
    const result = recipeFormSchema.safeParse({
      title: 'Pancakes',
      servings: '6',
      total_time_minutes: '',
      steps: 'Mix the batter\n\nFry',
      ingredients: 'flour | 200 g\r\nsalt',
      notes: 'Eat warm',
      tags: 'Breakfast, Quick ,',
      is_public: 'on',
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        title: 'Pancakes',
        summary: '',
        language: 'en',
        servings: 6,
        total_time_minutes: null,
        steps: ['Mix the batter', 'Fry'],
        ingredients: [
          { name: 'flour', quantity: '200 g' },
          { name: 'salt', quantity: '' },
        ],
        notes: ['Eat warm'],
        tags: ['breakfast', 'quick'],
        is_public: true,
      });
    }
  });

  it('keeps repeated step fields in order', () => {
    const result = recipeFormSchema.safeParse({ title: 'Toast', steps: ['Slice', ' ', 'Toast'] });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.steps).toEqual(['Slice', 'Toast']);
      expect(result.data.is_public).toBe(false);
    }
  });

  it('rejects non-numeric servings', () => {
    expect(recipeFormSchema.safeParse({ title: 'Toast', steps: 'Toast', servings: 'many' }).success).toBe(false);
  });
});

describe('recipeTableQuerySchema', () => {
  it('falls back to newest first for unknown values', () => {
    expect(recipeTableQuerySchema.parse({ sort: 'password', order: 'up' })).toEqual({
      sort: 'created_at',
      order: 'desc',
    });
    expect(recipeTableQuerySchema.parse({ sort: 'title', order: 'asc' })).toEqual({ sort: 'title', order: 'asc' });
  });
});

describe('bulk form schemas', () => {
  it('accepts a single checked row', () => {
    expect(bulkDeleteFormSchema.parse({ recipe_ids: '7' })).toEqual({ recipe_ids: [7] });
  });

  it('rejects an empty or malformed selection', () => {
    const empty = bulkDeleteFormSchema.safeParse({});
    const malformed = bulkDeleteFormSchema.safeParse({ recipe_ids: ['1', 'x'] });

    expect(empty.success).toBe(false);
    if (!empty.success) {
      expect(empty.error.issues[0]?.message).toBe('No recipes selected');
    }
    expect(malformed.success).toBe(false);
  });

  it('normalizes the tag of a bulk tag form', () => {
    expect(bulkTagFormSchema.parse({ recipe_ids: ['1', '2'], tag: ' Weeknight ' })).toEqual({
      recipe_ids: [1, 2],
      tag: 'weeknight',
    });
  });
});

describe('recipeExportQuerySchema', () => {
  it('accepts repeated and comma separated ids', () => {
    expect(recipeExportQuerySchema.parse({ ids: ['3', '5, 8'] })).toEqual({ ids: [3, 5, 8] });
    expect(recipeExportQuerySchema.parse({ ids: '4' })).toEqual({ ids: [4] });
  });

  it('leaves ids out when none are given', () => {
    expect(recipeExportQuerySchema.parse({})).toEqual({ ids: undefined });
  });

  it('rejects ids that are not numbers', () => {
    expect(recipeExportQuerySchema.safeParse({ ids: '1,abc' }).success).toBe(false);
  });
});

import { describe, expect, it } from 'vitest';
import {
  generateIdeasFormSchema,
  generateRecipeFormSchema,
  generateRecipeSchema,
} from './generation.schema.js';

describe('generateRecipeSchema', () => {
  it('defaults diet and use_only', () => {
    expect(generateRecipeSchema.parse({ ingredients: ['eggs'], servings: 2 })).toEqual({
      ingredients: ['eggs'],
      servings: 2,
      diet: 'none',
      use_only: false,
    });
  });

  it('rejects an unknown diet', () => {
    expect(generateRecipeSchema.safeParse({ ingredients: ['eggs'], servings: 2, diet: 'carnivore' }).success).toBe(
      false
    );
  });
});

describe('generateRecipeFormSchema', () => {
  it('splits the ingredient list and reads the checkbox', () => {
    expect(
      generateRecipeFormSchema.parse({
        ingredients: 'tomatoes, basil, ,garlic',
        servings: '3',
        diet: 'vegan',
        title: '  ',
        use_only: 'on',
      })
    ).toEqual({
      ingredients: ['tomatoes', 'basil', 'garlic'],
      servings: 3,
      diet: 'vegan',
      use_only: true,
    });
  });

  it('asks for at least one ingredient', () => {
    const result = generateRecipeFormSchema.safeParse({ ingredients: ' , ' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Please enter at least one ingredient');
    }
  });
});

describe('generateIdeasFormSchema', () => {
  it('asks for ten ideas by default', () => {
    expect(generateIdeasFormSchema.parse({ ingredients: 'rice' })).toEqual({
      ingredients: ['rice'],
      diet: 'none',
      use_only: false,
      count: 10,
    });
  });

  it('caps the number of ideas', () => {
    expect(generateIdeasFormSchema.safeParse({ ingredients: 'rice', count: '21' }).success).toBe(false);
  });
});

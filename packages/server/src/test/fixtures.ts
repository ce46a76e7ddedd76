import type { CreateRecipeDTO } from '@magic-chef/shared';

export function recipeInput(overrides: Partial<CreateRecipeDTO> = {}): CreateRecipeDTO {
  return {
    title: 'Tomato Soup',
    summary: 'A quick weeknight soup',
    language: 'en',
    servings: 4,
    total_time_minutes: 30,
    steps: ['Chop the tomatoes', 'Simmer for 20 minutes', 'Blend until smooth'],
    ingredients: [
      { name: 'tomatoes', quantity: '800 g' },
      { name: 'garlic', quantity: '2 cloves' },
    ],
    notes: ['Serve with bread'],
    tags: ['soup'],
    is_public: false,
    ...overrides,
  };
}

/** A well-formed generator answer in the shape the recipe prompt asks for. */
export function generatedRecipeJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    title: 'Tomato Basil Pasta',
    description: 'Fresh pasta with a garlicky tomato sauce',
    total_time_minutes: 25,
    notes: ['Top with extra basil'],
    ingredients: {
      servings: 2,
      items: {
        tomatoes: '4, diced',
        basil: '1 handful',
        garlic: '3 cloves, sliced',
        spaghetti: '200 g',
      },
    },
    instructions: [
      'Boil the spaghetti in salted water.',
      'Fry the garlic, then add the tomatoes.',
      'Toss the pasta with the sauce and basil.',
    ],
    tags: ['Italian', 'pasta'],
    ...overrides,
  });
}

/** A 1x1 transparent PNG. */
export const TINY_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=',
  'base64'
);

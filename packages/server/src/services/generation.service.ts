import { z } from 'zod';
import { info, warn } from 'firebase-functions/logger';
import {
  AI_GENERATED_TAG,
  LANGUAGE_NAMES,
  createRecipeSchema,
  type Diet,
  type GenerateIdeasInput,
  type GenerateRecipeInput,
  type LanguageCode,
  type RecipeWithDetails,
} from '@magic-chef/shared';
import type { RecipeRepository, UserRepository } from '../repositories/index.js';
import type { ChatMessage, LlmClient } from '../providers/index.js';
import { parseJsonObject } from '../providers/index.js';
import { NotFoundError, ProviderError } from '../types/errors.js';
import { parseRecipeDraft } from './recipe-draft.js';

const DISH_IDEAS_PROMPT = `You are an expert chef who suggests dishes for the ingredients a cook has at hand.

Respond ONLY with JSON in this exact shape:
{"dish_ideas": ["Dish title 1", "Dish title 2"]}

Guidelines:
- When told to use only the given ingredients, add nothing beyond common staples (oil, salt, pepper, water, rice, pasta, onions, garlic).
- Otherwise complement the given ingredients while keeping them central.
- Every dish must be practical for a home kitchen.
- Vary cuisines and cooking methods.
- Titles are short, specific and appetising.`;

const CREATE_RECIPE_PROMPT = `You are an experienced chef and recipe writer.

Respond ONLY with JSON in this exact shape:
{
  "title": "Recipe title",
  "description": "Short description of the dish",
  "total_time_minutes": 30,
  "notes": ["Tip", "Serving suggestion"],
  "ingredients": {
    "servings": 4,
    "items": {"ingredient name": "exact quantity and preparation"}
  },
  "instructions": ["First step as a full sentence", "Second step"],
  "tags": ["cuisine or course"]
}

Guidelines:
- Quantities must match the requested number of servings.
- The ingredient list must match the instructions exactly.
- Each instruction is one complete, actionable sentence.`;

const DIET_RULES: Record<Diet, string> = {
  none: '',
  vegetarian: 'The dish must be vegetarian: no meat or fish.',
  vegan: 'The dish must be vegan: no animal products at all.',
  pescatarian: 'The dish may contain fish or seafood but no other meat.',
  'gluten-free': 'The dish must be gluten-free.',
  'dairy-free': 'The dish must be dairy-free.',
};

const dishIdeasSchema = z.object({
  dish_ideas: z.array(z.string()),
});

function ingredientInstruction(ingredients: readonly string[], useOnly: boolean): string {
  const list = ingredients.join(', ');
  return useOnly
    ? `Use ONLY these ingredients plus basic kitchen staples: ${list}.`
    : `Use these ingredients and add complementary ones where it helps: ${list}.`;
}

export class GenerationService {
  constructor(
    private readonly llm: LlmClient,
    private readonly recipes: RecipeRepository,
    private readonly users: UserRepository
  ) {}

  async generateIdeas(input: GenerateIdeasInput): Promise<string[]> {
    const messages: ChatMessage[] = [
      { role: 'system', content: DISH_IDEAS_PROMPT },
      {
        role: 'user',
        content: [
          `Suggest ${input.count} dishes.`,
          ingredientInstruction(input.ingredients, input.use_only),
          DIET_RULES[input.diet],
        ]
          .filter((line) => line !== '')
          .join(' '),
      },
    ];

    const content = await this.llm.complete(messages, { temperature: 0.7, json: true });
    const parsed = dishIdeasSchema.safeParse(parseJsonObject(content));
    if (!parsed.success) {
      throw new ProviderError(this.llm.name, 'Model returned malformed dish ideas');
    }

    const ideas = [...new Set(parsed.data.dish_ideas.map((idea) => idea.trim()))]
      .filter((idea) => idea.length > 0)
      .slice(0, input.count);
    if (ideas.length === 0) {
      throw new ProviderError(this.llm.name, 'Model returned no dish ideas');
    }
    info('generation:ideas', { requested: input.count, returned: ideas.length, diet: input.diet });
    return ideas;
  }

  /**
   * Ask the model for a recipe and save it for userId. Nothing is saved
   * when the model fails or answers with something that is not a recipe.
   */
  async generate(userId: number, input: GenerateRecipeInput): Promise<RecipeWithDetails> {
    const user = this.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User', userId);
    }

    const content = await this.llm.complete(this.buildRecipeMessages(input, user.language), {
      temperature: 0.7,
      json: true,
    });

    const draft = parseRecipeDraft(content);
    if (!draft) {
      warn('generation:unparseable', { response_preview: content.substring(0, 500) });
      throw new ProviderError(this.llm.name, 'Model returned a malformed recipe');
    }

    const tags = [...draft.tags.slice(0, 20), AI_GENERATED_TAG];
    if (input.diet !== 'none') {
      tags.push(input.diet);
    }

    // Servings always follow the request, whatever the model claims
    const recipe = createRecipeSchema.safeParse({
      title: input.title ?? draft.title,
      summary: draft.summary,
      language: user.language,
      servings: input.servings,
      total_time_minutes: draft.total_time_minutes,
      steps: draft.steps,
      ingredients: draft.ingredients,
      notes: draft.notes,
      tags: tags.filter((tag) => tag.length <= 50),
      is_public: false,
    });
    if (!recipe.success) {
      warn('generation:invalid_recipe', {
        issues: recipe.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      throw new ProviderError(this.llm.name, 'Model returned an incomplete recipe');
    }

    const saved = this.recipes.create(userId, recipe.data);
    info('generation:recipe_saved', {
      recipe_id: saved.id,
      user_id: userId,
      steps: saved.steps.length,
      servings: saved.servings,
    });
    return saved;
  }

  private buildRecipeMessages(input: GenerateRecipeInput, language: LanguageCode): ChatMessage[] {
    const lines = [
      input.title !== undefined
        ? `Create a detailed recipe for "${input.title}" for ${input.servings} servings.`
        : `Create a detailed recipe for ${input.servings} servings.`,
      ingredientInstruction(input.ingredients, input.use_only),
      DIET_RULES[input.diet],
      `Write the recipe in ${LANGUAGE_NAMES[language]}.`,
    ];
    return [
      { role: 'system', content: CREATE_RECIPE_PROMPT },
      { role: 'user', content: lines.filter((line) => line !== '').join(' ') },
    ];
  }
}

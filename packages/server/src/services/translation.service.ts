import { info } from 'firebase-functions/logger';
import {
  LANGUAGE_NAMES,
  createRecipeSchema,
  type LanguageCode,
  type RecipeWithDetails,
} from '@magic-chef/shared';
import type { RecipeRepository } from '../repositories/index.js';
import type { TranslationProvider } from '../providers/index.js';
import { ProviderError, ValidationError } from '../types/errors.js';
import type { RecipeService } from './recipe.service.js';

/**
 * Collects the text fields of a recipe into one batch and hands the
 * translations back in the same layout. Empty strings are not sent.
 */
class TextBatch {
  private readonly texts: string[] = [];

  add(text: string): number {
    if (text.trim() === '') {
      return -1;
    }
    this.texts.push(text);
    return this.texts.length - 1;
  }

  get items(): string[] {
    return [...this.texts];
  }
}

function pick(translations: readonly string[], index: number, fallback: string): string {
  if (index === -1) {
    return fallback;
  }
  return translations[index] ?? fallback;
}

export class TranslationService {
  constructor(
    private readonly translator: TranslationProvider,
    private readonly recipes: RecipeRepository,
    private readonly recipeService: RecipeService
  ) {}

  /**
   * Save a translated copy of a readable recipe for userId. The source
   * recipe is left as it is.
   */
  async translate(userId: number, id: number, target: LanguageCode): Promise<RecipeWithDetails> {
    const source = this.recipeService.get(userId, id);
    if (source.language === target) {
      throw new ValidationError(`Recipe is already in ${LANGUAGE_NAMES[target]}`);
    }

    const batch = new TextBatch();
    const title = batch.add(source.title);
    const summary = batch.add(source.summary);
    const notes = source.notes.map((note) => batch.add(note));
    const ingredients = source.ingredients.map((ingredient) => ({
      name: batch.add(ingredient.name),
      quantity: batch.add(ingredient.quantity),
    }));
    const steps = source.steps.map((step) => batch.add(step.instruction));

    const texts = batch.items;
    const start = Date.now();
    let translations: string[];
    try {
      translations = await this.translator.translateBatch(texts, target, source.language);
    } catch (error) {
      throw ProviderError.from(this.translator.name, error);
    }
    if (translations.length !== texts.length) {
      throw new ProviderError(
        this.translator.name,
        `Expected ${texts.length} translations, got ${translations.length}`
      );
    }

    const translated = createRecipeSchema.safeParse({
      title: pick(translations, title, source.title),
      summary: pick(translations, summary, source.summary),
      language: target,
      servings: source.servings,
      total_time_minutes: source.total_time_minutes,
      notes: notes.map((index, i) => pick(translations, index, source.notes[i] ?? '')),
      ingredients: ingredients.map((indexes, i) => ({
        name: pick(translations, indexes.name, source.ingredients[i]?.name ?? ''),
        quantity: pick(translations, indexes.quantity, source.ingredients[i]?.quantity ?? ''),
      })),
      steps: steps.map((index, i) => pick(translations, index, source.steps[i]?.instruction ?? '')),
      tags: source.tags,
      is_public: false,
    });
    if (!translated.success) {
      throw new ProviderError(this.translator.name, 'Translation produced an invalid recipe');
    }

    const saved = this.recipes.create(userId, translated.data, { original_id: source.id });
    info('translation:saved', {
      recipe_id: saved.id,
      source_id: source.id,
      source_language: source.language,
      target_language: target,
      texts: texts.length,
      elapsed_ms: Date.now() - start,
    });
    return saved;
  }
}

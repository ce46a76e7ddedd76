import { z } from 'zod';
import { LANGUAGE_NAMES, type LanguageCode } from '@magic-chef/shared';
import { ProviderError } from '../../types/errors.js';
import { parseJsonObject } from '../json.js';
import type { LlmClient, TranslationProvider } from '../types.js';

const translationResponseSchema = z.object({
  translations: z.array(z.string()),
});

/** Translates through the configured LLM, one request per batch. */
export class LlmTranslator implements TranslationProvider {
  readonly name: string;

  constructor(private readonly llm: LlmClient) {
    this.name = `${llm.name}-translate`;
  }

  async translateBatch(texts: string[], target: LanguageCode, source: LanguageCode): Promise<string[]> {
    if (texts.length === 0) {
      return [];
    }

    const content = await this.llm.complete(
      [
        {
          role: 'system',
          content:
            `You translate recipe text from ${LANGUAGE_NAMES[source]} to ${LANGUAGE_NAMES[target]}. ` +
            'You receive a JSON object {"texts": [...]} and answer ONLY with a JSON object ' +
            '{"translations": [...]} holding exactly one translation per input text, in the same order. ' +
            'Keep quantities, units and numbers as they are.',
        },
        { role: 'user', content: JSON.stringify({ texts }) },
      ],
      { temperature: 0, json: true }
    );

    const parsed = translationResponseSchema.safeParse(parseJsonObject(content));
    if (!parsed.success) {
      throw new ProviderError(this.name, 'Model returned malformed translations');
    }
    return parsed.data.translations;
  }
}

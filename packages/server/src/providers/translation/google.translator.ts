import { z } from 'zod';
import { info } from 'firebase-functions/logger';
import type { LanguageCode } from '@magic-chef/shared';
import { ProviderError } from '../../types/errors.js';
import type { TranslationProvider } from '../types.js';

const GOOGLE_TRANSLATE_URL = 'https://translation.googleapis.com/language/translate/v2';

const googleResponseSchema = z.object({
  data: z.object({
    translations: z.array(z.object({ translatedText: z.string() })),
  }),
});

export interface GoogleTranslatorDeps {
  apiKey: string | undefined;
  fetchFn: typeof fetch;
}

/** Google Cloud Translation v2 over REST. */
export class GoogleTranslator implements TranslationProvider {
  readonly name = 'google-translate';

  constructor(private readonly deps: GoogleTranslatorDeps) {}

  async translateBatch(texts: string[], target: LanguageCode, source: LanguageCode): Promise<string[]> {
    if (this.deps.apiKey === undefined) {
      throw new ProviderError(this.name, 'GOOGLE_TRANSLATE_API_KEY is not configured');
    }
    if (texts.length === 0) {
      return [];
    }

    const start = Date.now();
    let response: Response;
    try {
      response = await this.deps.fetchFn(
        `${GOOGLE_TRANSLATE_URL}?key=${encodeURIComponent(this.deps.apiKey)}`,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ q: texts, source, target, format: 'text' }),
        }
      );
    } catch (error) {
      throw ProviderError.from(this.name, error);
    }

    if (!response.ok) {
      throw new ProviderError(this.name, `API returned ${response.status}`);
    }

    const parsed = googleResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError(this.name, 'Unexpected response shape');
    }

    info('translation:google_call', {
      elapsed_ms: Date.now() - start,
      text_count: texts.length,
      source,
      target,
    });
    return parsed.data.data.translations.map((translation) => translation.translatedText);
  }
}

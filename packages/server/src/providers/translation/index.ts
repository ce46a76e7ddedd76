import type { AppConfig } from '../../config.js';
import type { LlmClient, TranslationProvider } from '../types.js';
import { GoogleTranslator } from './google.translator.js';
import { LlmTranslator } from './llm.translator.js';

export { GoogleTranslator } from './google.translator.js';
export { LlmTranslator } from './llm.translator.js';

export function createTranslationProvider(
  translation: AppConfig['translation'],
  llm: LlmClient
): TranslationProvider {
  switch (translation.provider) {
    case 'google':
      return new GoogleTranslator({ apiKey: translation.googleApiKey, fetchFn: fetch });
    case 'llm':
      return new LlmTranslator(llm);
  }
}

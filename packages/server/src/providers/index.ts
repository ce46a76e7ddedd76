import type { AppConfig } from '../config.js';
import { createLlmClient } from './llm/index.js';
import { createOcrProvider } from './ocr/index.js';
import { createStorageProvider } from './storage/index.js';
import { createTranslationProvider } from './translation/index.js';
import type { Providers } from './types.js';

export type {
  ChatMessage,
  CompletionOptions,
  ImageInput,
  LlmClient,
  OcrProvider,
  Providers,
  StorageProvider,
  TranslationProvider,
  VisionClient,
} from './types.js';
export { parseJsonObject } from './json.js';
export { LOCAL_UPLOADS_URL_PREFIX, LocalStorage } from './storage/index.js';

/** Wire the adapters named by the configuration. Nothing connects until first use. */
export function createProviders(config: AppConfig): Providers {
  const llm = createLlmClient(config.ai);
  return {
    llm,
    translation: createTranslationProvider(config.translation, llm),
    ocr: createOcrProvider(config),
    storage: createStorageProvider(config.storage),
  };
}

import type { LanguageCode } from '@magic-chef/shared';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  /** Ask the model for a bare JSON object */
  json?: boolean;
}

export interface ImageInput {
  data: Buffer;
  contentType: string;
}

/** Text generation backend (recipe generation, LLM translation, draft structuring). */
export interface LlmClient {
  readonly name: string;
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

export interface VisionClient {
  readonly name: string;
  readImage(prompt: string, image: ImageInput): Promise<string>;
}

export interface OcrProvider {
  readonly name: string;
  extractText(image: ImageInput): Promise<string>;
}

export interface TranslationProvider {
  readonly name: string;
  /** Must resolve to exactly one translation per input text, in order. */
  translateBatch(texts: string[], target: LanguageCode, source: LanguageCode): Promise<string[]>;
}

export interface StorageProvider {
  readonly name: string;
  save(key: string, data: Buffer, contentType: string): Promise<void>;
  delete(key: string): Promise<void>;
  publicUrl(key: string): string;
}

export interface Providers {
  llm: LlmClient;
  translation: TranslationProvider;
  ocr: OcrProvider;
  storage: StorageProvider;
}

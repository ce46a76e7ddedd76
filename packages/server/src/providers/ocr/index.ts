import { defaultModelFor, type AppConfig } from '../../config.js';
import { AnthropicClient } from '../llm/anthropic.client.js';
import { OpenAiClient } from '../llm/openai.client.js';
import type { OcrProvider } from '../types.js';
import { TesseractOcr } from './tesseract.ocr.js';
import { VisionOcr } from './vision.ocr.js';

export { TesseractOcr } from './tesseract.ocr.js';
export { VisionOcr } from './vision.ocr.js';

export function createOcrProvider(config: Pick<AppConfig, 'ai' | 'ocr'>): OcrProvider {
  const { ai, ocr } = config;
  // Reuse AI_MODEL only when it belongs to the same vendor
  const modelFor = (provider: 'openai' | 'anthropic'): string =>
    ai.provider === provider ? ai.model : defaultModelFor(provider);

  switch (ocr.provider) {
    case 'tesseract':
      return new TesseractOcr({ binaryPath: ocr.tesseractPath, languages: ocr.tesseractLanguages });
    case 'openai':
      return new VisionOcr(new OpenAiClient({ apiKey: ai.openaiApiKey, model: modelFor('openai') }));
    case 'anthropic':
      return new VisionOcr(
        new AnthropicClient({ apiKey: ai.anthropicApiKey, model: modelFor('anthropic') })
      );
  }
}

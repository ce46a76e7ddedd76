import type { AppConfig } from '../../config.js';
import type { LlmClient, VisionClient } from '../types.js';
import { AnthropicClient } from './anthropic.client.js';
import { OpenAiClient } from './openai.client.js';

export { OpenAiClient } from './openai.client.js';
export { AnthropicClient } from './anthropic.client.js';

export function createLlmClient(ai: AppConfig['ai']): LlmClient & VisionClient {
  switch (ai.provider) {
    case 'openai':
      return new OpenAiClient({ apiKey: ai.openaiApiKey, model: ai.model });
    case 'anthropic':
      return new AnthropicClient({ apiKey: ai.anthropicApiKey, model: ai.model });
  }
}

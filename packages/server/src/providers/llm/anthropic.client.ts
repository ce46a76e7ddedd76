import Anthropic from '@anthropic-ai/sdk';
import { info } from 'firebase-functions/logger';
import { ProviderError } from '../../types/errors.js';
import type { ChatMessage, CompletionOptions, ImageInput, LlmClient, VisionClient } from '../types.js';

export interface AnthropicClientOptions {
  apiKey: string | undefined;
  model: string;
}

const DEFAULT_MAX_TOKENS = 4096;

const VISION_MEDIA_TYPES = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'] as const;
type VisionMediaType = (typeof VISION_MEDIA_TYPES)[number];

function toVisionMediaType(contentType: string): VisionMediaType | null {
  return VISION_MEDIA_TYPES.find((type) => type === contentType) ?? null;
}

export class AnthropicClient implements LlmClient, VisionClient {
  readonly name = 'anthropic';
  private client: Anthropic | null = null;

  constructor(private readonly options: AnthropicClientOptions) {}

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    // The system prompt travels outside the message list
    const system = messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n\n');
    const conversation: Anthropic.Messages.MessageParam[] = messages
      .filter((message) => message.role !== 'system')
      .map((message): Anthropic.Messages.MessageParam => ({
        role: message.role === 'assistant' ? 'assistant' : 'user',
        content: message.content,
      }));

    return this.send(
      {
        model: this.options.model,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        messages: conversation,
        ...(system !== '' ? { system } : {}),
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
      },
      'llm:anthropic_call'
    );
  }

  async readImage(prompt: string, image: ImageInput): Promise<string> {
    const mediaType = toVisionMediaType(image.contentType);
    if (mediaType === null) {
      throw new ProviderError(this.name, `Cannot read ${image.contentType} images`);
    }

    return this.send(
      {
        model: this.options.model,
        max_tokens: DEFAULT_MAX_TOKENS,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: prompt },
              {
                type: 'image',
                source: { type: 'base64', media_type: mediaType, data: image.data.toString('base64') },
              },
            ],
          },
        ],
      },
      'llm:anthropic_vision_call'
    );
  }

  private getClient(): Anthropic {
    if (this.options.apiKey === undefined) {
      throw new ProviderError(this.name, 'ANTHROPIC_API_KEY is not configured');
    }
    this.client ??= new Anthropic({ apiKey: this.options.apiKey });
    return this.client;
  }

  private async send(
    params: Anthropic.Messages.MessageCreateParamsNonStreaming,
    event: string
  ): Promise<string> {
    const client = this.getClient();
    const start = Date.now();
    try {
      const response = await client.messages.create(params);
      info(event, {
        elapsed_ms: Date.now() - start,
        model: params.model,
        input_tokens: response.usage.input_tokens,
        output_tokens: response.usage.output_tokens,
      });

      const text = response.content
        .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('');
      if (text.trim() === '') {
        throw new ProviderError(this.name, 'Empty response from model');
      }
      return text;
    } catch (error) {
      throw ProviderError.from(this.name, error);
    }
  }
}

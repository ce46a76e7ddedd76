import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions.js';
import { info } from 'firebase-functions/logger';
import { ProviderError } from '../../types/errors.js';
import type { ChatMessage, CompletionOptions, ImageInput, LlmClient, VisionClient } from '../types.js';

export interface OpenAiClientOptions {
  apiKey: string | undefined;
  model: string;
}

function toOpenAiMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAiClient implements LlmClient, VisionClient {
  readonly name = 'openai';
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAiClientOptions) {}

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    return this.send(messages.map(toOpenAiMessage), options, 'llm:openai_call');
  }

  async readImage(prompt: string, image: ImageInput): Promise<string> {
    const url = `data:${image.contentType};base64,${image.data.toString('base64')}`;
    return this.send(
      [
        {
          role: 'user',
          content: [
            { type: 'text', text: prompt },
            { type: 'image_url', image_url: { url } },
          ],
        },
      ],
      { maxTokens: 4096 },
      'llm:openai_vision_call'
    );
  }

  private getClient(): OpenAI {
    if (this.options.apiKey === undefined) {
      throw new ProviderError(this.name, 'OPENAI_API_KEY is not configured');
    }
    this.client ??= new OpenAI({ apiKey: this.options.apiKey });
    return this.client;
  }

  private async send(
    messages: ChatCompletionMessageParam[],
    options: CompletionOptions,
    event: string
  ): Promise<string> {
    const client = this.getClient();
    const start = Date.now();
    try {
      const response = await client.chat.completions.create({
        model: this.options.model,
        messages,
        temperature: options.temperature,
        max_tokens: options.maxTokens,
        ...(options.json === true ? { response_format: { type: 'json_object' as const } } : {}),
      });

      const usage = response.usage;
      info(event, {
        elapsed_ms: Date.now() - start,
        model: this.options.model,
        prompt_tokens: usage?.prompt_tokens,
        completion_tokens: usage?.completion_tokens,
      });

      const content = response.choices[0]?.message.content ?? '';
      if (content.trim() === '') {
        throw new ProviderError(this.name, 'Empty response from model');
      }
      return content;
    } catch (error) {
      throw ProviderError.from(this.name, error);
    }
  }
}

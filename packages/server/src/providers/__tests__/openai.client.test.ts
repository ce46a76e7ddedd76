import { describe, it, expect, vi, beforeEach } from 'vitest';

// Mock OpenAI before importing the client
const mockCreate = vi.fn();
vi.mock('openai', () => ({
  default: vi.fn().mockImplementation(() => ({
    chat: {
      completions: {
        create: mockCreate,
      },
    },
  })),
}));

import { OpenAiClient } from '../llm/openai.client.js';
import { ProviderError } from '../../types/errors.js';

describe('OpenAiClient', () => {
  beforeEach(() => {
    mockCreate.mockReset();
  });

  it('should send the messages and return the answer', async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: '{"ok": true}' } }],
      usage: { prompt_tokens: 10, completion_tokens: 4 },
    });
    const client = new OpenAiClient({ apiKey: 'test-key', model: 'gpt-test' });

    const answer = await client.complete(
      [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'Hi' },
      ],
      { temperature: 0.2, json: true }
    );

    expect(answer).toBe('{"ok": true}');
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'gpt-test',
      messages: [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'Hi' },
      ],
      temperature: 0.2,
      max_tokens: undefined,
      response_format: { type: 'json_object' },
    });
  });

  it('should send images as data URLs', async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: 'Soup recipe' } }] });
    const client = new OpenAiClient({ apiKey: 'test-key', model: 'gpt-test' });

    await client.readImage('Read this', { data: Buffer.from('abc'), contentType: 'image/png' });

    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: 'Read this' },
              { type: 'image_url', image_url: { url: 'data:image/png;base64,YWJj' } },
            ],
          },
        ],
      })
    );
  });

  it('should fail without an API key', async () => {
    const client = new OpenAiClient({ apiKey: undefined, model: 'gpt-test' });

    await expect(client.complete([{ role: 'user', content: 'Hi' }])).rejects.toThrow(
      new ProviderError('openai', 'OPENAI_API_KEY is not configured')
    );
    expect(mockCreate).not.toHaveBeenCalled();
  });

  it('should treat an empty answer as a failure', async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: '  ' } }] });
    const client = new OpenAiClient({ apiKey: 'test-key', model: 'gpt-test' });

    await expect(client.complete([{ role: 'user', content: 'Hi' }])).rejects.toThrow(
      'openai: Empty response from model'
    );
  });

  it('should wrap API errors in a ProviderError', async () => {
    mockCreate.mockRejectedValue(new Error('Rate limit reached'));
    const client = new OpenAiClient({ apiKey: 'test-key', model: 'gpt-test' });

    await expect(client.complete([{ role: 'user', content: 'Hi' }])).rejects.toThrow(
      new ProviderError('openai', 'Rate limit reached')
    );
  });
});

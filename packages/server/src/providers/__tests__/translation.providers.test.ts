import { describe, it, expect, vi } from 'vitest';
import { GoogleTranslator } from '../translation/google.translator.js';
import { LlmTranslator } from '../translation/llm.translator.js';
import { FakeLlmClient } from '../../test/fakes.js';
import { ProviderError } from '../../types/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('GoogleTranslator', () => {
  it('should post all texts in one request and keep their order', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ data: { translations: [{ translatedText: 'Suppe' }, { translatedText: 'Brot' }] } })
    );
    const translator = new GoogleTranslator({ apiKey: 'test-key', fetchFn });

    const result = await translator.translateBatch(['Soup', 'Bread'], 'de', 'en');

    expect(result).toEqual(['Suppe', 'Brot']);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn).toHaveBeenCalledWith(
      'https://translation.googleapis.com/language/translate/v2?key=test-key',
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ q: ['Soup', 'Bread'], source: 'en', target: 'de', format: 'text' }),
      }
    );
  });

  it('should not call the API for an empty batch', async () => {
    const fetchFn = vi.fn<typeof fetch>();
    const translator = new GoogleTranslator({ apiKey: 'test-key', fetchFn });

    expect(await translator.translateBatch([], 'de', 'en')).toEqual([]);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should fail without an API key', async () => {
    const translator = new GoogleTranslator({ apiKey: undefined, fetchFn: vi.fn<typeof fetch>() });

    await expect(translator.translateBatch(['Soup'], 'de', 'en')).rejects.toThrow(
      'google-translate: GOOGLE_TRANSLATE_API_KEY is not configured'
    );
  });

  it('should report HTTP errors', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: 'denied' }, 403));
    const translator = new GoogleTranslator({ apiKey: 'test-key', fetchFn });

    await expect(translator.translateBatch(['Soup'], 'de', 'en')).rejects.toThrow(
      new ProviderError('google-translate', 'API returned 403')
    );
  });

  it('should reject an unexpected response shape', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ data: {} }));
    const translator = new GoogleTranslator({ apiKey: 'test-key', fetchFn });

    await expect(translator.translateBatch(['Soup'], 'de', 'en')).rejects.toThrow(
      'google-translate: Unexpected response shape'
    );
  });

  it('should wrap network failures', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
    const translator = new GoogleTranslator({ apiKey: 'test-key', fetchFn });

    await expect(translator.translateBatch(['Soup'], 'de', 'en')).rejects.toThrow(
      new ProviderError('google-translate', 'fetch failed')
    );
  });
});

describe('LlmTranslator', () => {
  it('should send the texts as JSON and return the translations', async () => {
    const llm = new FakeLlmClient().reply('{"translations": ["Suppe", "Brot"]}');
    const translator = new LlmTranslator(llm);

    expect(await translator.translateBatch(['Soup', 'Bread'], 'de', 'en')).toEqual(['Suppe', 'Brot']);
    expect(llm.calls[0]?.messages[1]).toEqual({ role: 'user', content: '{"texts":["Soup","Bread"]}' });
    expect(llm.calls[0]?.messages[0]?.content).toContain('from English to German');
    expect(llm.calls[0]?.options).toEqual({ temperature: 0, json: true });
  });

  it('should be named after the model client', () => {
    expect(new LlmTranslator(new FakeLlmClient()).name).toBe('fake-llm-translate');
  });

  it('should reject malformed answers', async () => {
    const translator = new LlmTranslator(new FakeLlmClient().reply('{"result": "Suppe"}'));

    await expect(translator.translateBatch(['Soup'], 'de', 'en')).rejects.toThrow(
      'fake-llm-translate: Model returned malformed translations'
    );
  });
});

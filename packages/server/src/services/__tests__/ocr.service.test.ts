import { describe, it, expect, beforeEach } from 'vitest';
import { OcrService } from '../ocr.service.js';
import { FakeLlmClient, FakeOcr } from '../../test/fakes.js';
import { TINY_PNG } from '../../test/fixtures.js';
import { ProviderError, ValidationError } from '../../types/errors.js';

describe('OcrService', () => {
  let ocr: FakeOcr;
  let llm: FakeLlmClient;
  let service: OcrService;

  beforeEach(() => {
    ocr = new FakeOcr();
    llm = new FakeLlmClient();
    service = new OcrService(ocr, llm);
  });

  it('should return the text and a structured draft', async () => {
    llm.reply(
      JSON.stringify({
        title: 'Pancakes',
        description: '',
        servings: null,
        total_time_minutes: null,
        ingredients: [
          { name: 'flour', quantity: '200 g' },
          { name: 'eggs', quantity: '2' },
        ],
        instructions: ['Mix and fry.'],
        notes: [],
        tags: [],
      })
    );

    const result = await service.digitise({ data: TINY_PNG, contentType: 'image/png' });

    expect(result).toEqual({
      text: 'Pancakes\n200 g flour\n2 eggs\nMix and fry.',
      draft: {
        title: 'Pancakes',
        summary: '',
        servings: null,
        total_time_minutes: null,
        ingredients: [
          { name: 'flour', quantity: '200 g' },
          { name: 'eggs', quantity: '2' },
        ],
        steps: ['Mix and fry.'],
        notes: [],
        tags: [],
      },
    });
    expect(ocr.calls).toEqual([{ data: TINY_PNG, contentType: 'image/png' }]);
    expect(llm.calls[0]?.messages[1]?.content).toBe('Pancakes\n200 g flour\n2 eggs\nMix and fry.');
  });

  it('should still return the text when structuring fails', async () => {
    llm.reply(new Error('model unavailable'));

    const result = await service.digitise({ data: TINY_PNG, contentType: 'image/png' });

    expect(result.draft).toBeNull();
    expect(result.text).toBe('Pancakes\n200 g flour\n2 eggs\nMix and fry.');
  });

  it('should return no draft for an unparseable answer', async () => {
    llm.reply('not json');

    const result = await service.digitise({ data: TINY_PNG, contentType: 'image/png' });

    expect(result.draft).toBeNull();
  });

  it('should reject images without text', async () => {
    ocr.text = '  \n ';

    await expect(service.digitise({ data: TINY_PNG, contentType: 'image/png' })).rejects.toThrow(
      new ValidationError('No text was found in the image')
    );
    expect(llm.calls).toHaveLength(0);
  });

  it('should wrap OCR failures in a ProviderError', async () => {
    ocr.extractText = async (): Promise<string> => {
      throw new Error('tesseract not found');
    };

    await expect(service.digitise({ data: TINY_PNG, contentType: 'image/png' })).rejects.toThrow(
      new ProviderError('fake-ocr', 'tesseract not found')
    );
  });
});

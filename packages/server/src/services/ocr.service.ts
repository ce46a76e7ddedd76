import { info, warn } from 'firebase-functions/logger';
import type { OcrResult, RecipeDraft } from '@magic-chef/shared';
import type { ImageInput, LlmClient, OcrProvider } from '../providers/index.js';
import { ProviderError, ValidationError } from '../types/errors.js';
import { parseRecipeDraft } from './recipe-draft.js';

const STRUCTURE_PROMPT = `You turn OCR text of a recipe into structured data. Fix obvious OCR mistakes but invent nothing.

Respond ONLY with JSON in this exact shape:
{
  "title": "Recipe title",
  "description": "Short description, empty if none",
  "servings": 4,
  "total_time_minutes": null,
  "ingredients": [{"name": "flour", "quantity": "200 g"}],
  "instructions": ["Step one", "Step two"],
  "notes": [],
  "tags": []
}

Use null for servings or total_time_minutes when the text does not say.`;

export class OcrService {
  constructor(
    private readonly ocr: OcrProvider,
    private readonly llm: LlmClient
  ) {}

  /** Read the image and propose a draft. Nothing is saved. */
  async digitise(image: ImageInput): Promise<OcrResult> {
    const start = Date.now();
    let text: string;
    try {
      text = (await this.ocr.extractText(image)).trim();
    } catch (error) {
      throw ProviderError.from(this.ocr.name, error);
    }
    if (text === '') {
      throw new ValidationError('No text was found in the image');
    }

    const draft = await this.structure(text);
    info('ocr:digitised', {
      provider: this.ocr.name,
      chars: text.length,
      has_draft: draft !== null,
      elapsed_ms: Date.now() - start,
    });
    return { text, draft };
  }

  // A draft is a convenience; the raw text is returned either way
  private async structure(text: string): Promise<RecipeDraft | null> {
    try {
      const content = await this.llm.complete(
        [
          { role: 'system', content: STRUCTURE_PROMPT },
          { role: 'user', content: text },
        ],
        { temperature: 0, json: true }
      );
      const draft = parseRecipeDraft(content);
      if (!draft) {
        warn('ocr:draft_unparseable', { response_preview: content.substring(0, 500) });
      }
      return draft;
    } catch (error) {
      warn('ocr:draft_failed', {
        error_message: error instanceof Error ? error.message : 'Unknown error',
      });
      return null;
    }
  }
}

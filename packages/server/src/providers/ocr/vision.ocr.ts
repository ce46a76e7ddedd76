import type { ImageInput, OcrProvider, VisionClient } from '../types.js';

const TRANSCRIBE_PROMPT =
  'Transcribe all text in this image exactly as written, keeping line breaks. ' +
  'Answer with the text only, no commentary.';

/** OCR through a multimodal model. */
export class VisionOcr implements OcrProvider {
  readonly name: string;

  constructor(private readonly vision: VisionClient) {
    this.name = `${vision.name}-vision`;
  }

  extractText(image: ImageInput): Promise<string> {
    return this.vision.readImage(TRANSCRIBE_PROMPT, image);
  }
}

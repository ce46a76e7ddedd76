import { spawn } from 'node:child_process';
import { info } from 'firebase-functions/logger';
import { ProviderError } from '../../types/errors.js';
import type { ImageInput, OcrProvider } from '../types.js';

export interface TesseractOptions {
  binaryPath: string;
  /** Tesseract language packs joined by '+', e.g. "eng+deu" */
  languages: string;
}

/** Runs the tesseract CLI with the image on stdin and text on stdout. */
export class TesseractOcr implements OcrProvider {
  readonly name = 'tesseract';

  constructor(private readonly options: TesseractOptions) {}

  extractText(image: ImageInput): Promise<string> {
    const start = Date.now();

    return new Promise<string>((resolve, reject) => {
      const child = spawn(this.options.binaryPath, ['stdin', 'stdout', '-l', this.options.languages], {
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error) => {
        reject(ProviderError.from(this.name, error));
      });

      child.on('close', (code) => {
        if (code !== 0) {
          const message = Buffer.concat(stderr).toString('utf8').trim();
          reject(new ProviderError(this.name, message || `exited with code ${code ?? 'null'}`));
          return;
        }
        const text = Buffer.concat(stdout).toString('utf8');
        info('ocr:tesseract_call', {
          elapsed_ms: Date.now() - start,
          bytes: image.data.length,
          chars: text.length,
        });
        resolve(text);
      });

      // EPIPE when the binary exits early; the close handler reports it
      child.stdin.on('error', () => undefined);
      child.stdin.end(image.data);
    });
  }
}

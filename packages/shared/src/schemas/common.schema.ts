import { z } from 'zod';
import { SUPPORTED_LANGUAGES } from '../constants/languages.js';

export const languageSchema = z.enum(SUPPORTED_LANGUAGES, {
  errorMap: () => ({ message: `Language must be one of: ${SUPPORTED_LANGUAGES.join(', ')}` }),
});

// Tags are stored lower-cased so tag search is case-insensitive
export const tagNameSchema = z
  .string()
  .trim()
  .min(1)
  .max(50)
  .transform((value) => value.replace(/\s+/g, ' ').toLowerCase());

/** Splits a textarea value into trimmed, non-empty lines. */
export function splitLines(value: string): string[] {
  return value
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** Splits a comma separated value into trimmed, non-empty items. */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseIntOrNaN(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value.trim());
}

export function isCheckboxOn(value: string | undefined): boolean {
  return value === 'on' || value === 'true' || value === '1';
}

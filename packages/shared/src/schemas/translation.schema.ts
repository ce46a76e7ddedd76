import { z } from 'zod';
import { languageSchema } from './common.schema.js';

export const translateRecipeSchema = z.object({
  target_lang: languageSchema,
});

export type TranslateRecipeInput = z.infer<typeof translateRecipeSchema>;

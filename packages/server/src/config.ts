import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';

const MIB = 1024 * 1024;

const DEFAULT_MODELS = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-sonnet-latest',
} as const;

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    DATABASE_PATH: z.string().min(1).default('data/magic-chef.db'),
    SESSION_SECRET: z.string().min(1).optional(),

    AI_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
    AI_MODEL: z.string().min(1).optional(),
    OPENAI_API_KEY: z.string().min(1).optional(),
    ANTHROPIC_API_KEY: z.string().min(1).optional(),

    TRANSLATION_PROVIDER: z.enum(['google', 'llm']).default('llm'),
    GOOGLE_TRANSLATE_API_KEY: z.string().min(1).optional(),

    OCR_PROVIDER: z.enum(['tesseract', 'openai', 'anthropic']).default('tesseract'),
    TESSERACT_PATH: z.string().min(1).default('tesseract'),
    TESSERACT_LANGUAGES: z.string().min(1).default('eng+deu+spa+fra+ita+tur'),
    OCR_MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * MIB),

    STORAGE_PROVIDER: z.enum(['local', 'firebase']).default('local'),
    UPLOAD_DIR: z.string().min(1).default('data/uploads'),
    FIREBASE_STORAGE_BUCKET: z.string().min(1).optional(),
    IMAGE_MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(16 * MIB),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && env.SESSION_SECRET === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SESSION_SECRET'],
        message: 'SESSION_SECRET is required in production',
      });
    }
    if (env.STORAGE_PROVIDER === 'firebase' && env.FIREBASE_STORAGE_BUCKET === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['FIREBASE_STORAGE_BUCKET'],
        message: 'FIREBASE_STORAGE_BUCKET is required when STORAGE_PROVIDER=firebase',
      });
    }
  });

export type AiProviderName = 'openai' | 'anthropic';
export type TranslationProviderName = 'google' | 'llm';
export type OcrProviderName = 'tesseract' | 'openai' | 'anthropic';
export type StorageProviderName = 'local' | 'firebase';

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  databasePath: string;
  sessionSecret: string;
  ai: {
    provider: AiProviderName;
    model: string;
    openaiApiKey: string | undefined;
    anthropicApiKey: string | undefined;
  };
  translation: {
    provider: TranslationProviderName;
    googleApiKey: string | undefined;
  };
  ocr: {
    provider: OcrProviderName;
    tesseractPath: string;
    tesseractLanguages: string;
    maxUploadBytes: number;
  };
  storage: {
    provider: StorageProviderName;
    uploadDir: string;
    firebaseBucket: string | undefined;
  };
  images: {
    maxUploadBytes: number;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Load `.env` (then `.env.local`, which wins) into process.env.
 * Variables already set by the platform are left alone.
 */
export function loadEnvironment(cwd: string = process.cwd()): void {
  dotenv.config({ path: path.resolve(cwd, '.env.local'), override: true });
  dotenv.config({ path: path.resolve(cwd, '.env') });
}

// Blank lines in .env mean "not set"
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const entries: [string, string][] = [];
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      entries.push([key, value]);
    }
  }
  return Object.fromEntries(entries);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(withoutBlankValues(env));
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const parsed = result.data;

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    databasePath: parsed.DATABASE_PATH,
    sessionSecret: parsed.SESSION_SECRET ?? 'magic-chef-dev-secret',
    ai: {
      provider: parsed.AI_PROVIDER,
      model: parsed.AI_MODEL ?? DEFAULT_MODELS[parsed.AI_PROVIDER],
      openaiApiKey: parsed.OPENAI_API_KEY,
      anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    },
    translation: {
      provider: parsed.TRANSLATION_PROVIDER,
      googleApiKey: parsed.GOOGLE_TRANSLATE_API_KEY,
    },
    ocr: {
      provider: parsed.OCR_PROVIDER,
      tesseractPath: parsed.TESSERACT_PATH,
      tesseractLanguages: parsed.TESSERACT_LANGUAGES,
      maxUploadBytes: parsed.OCR_MAX_UPLOAD_BYTES,
    },
    storage: {
      provider: parsed.STORAGE_PROVIDER,
      uploadDir: parsed.UPLOAD_DIR,
      firebaseBucket: parsed.FIREBASE_STORAGE_BUCKET,
    },
    images: {
      maxUploadBytes: parsed.IMAGE_MAX_UPLOAD_BYTES,
    },
  };
}

export function defaultModelFor(provider: AiProviderName): string {
  return DEFAULT_MODELS[provider];
}

import type { LanguageCode } from '../constants/languages.js';

export interface RecipeStep {
  /** 1-based, contiguous within a recipe */
  position: number;
  instruction: string;
}

export interface RecipeIngredient {
  name: string;
  /** Free text, e.g. "200 g, diced" */
  quantity: string;
}

export interface RecipeImage {
  id: number;
  recipe_id: number;
  storage_key: string;
  alt_text: string;
  content_type: string;
  size_bytes: number;
  created_at: string;
}

export interface Recipe {
  id: number;
  user_id: number;
  title: string;
  summary: string;
  language: LanguageCode;
  servings: number;
  total_time_minutes: number | null;
  notes: string[];
  is_public: boolean;
  /** Root of the copy/translation lineage; a fresh recipe points at itself */
  original_id: number | null;
  created_at: string;
  updated_at: string;
}

export interface RecipeWithDetails extends Recipe {
  steps: RecipeStep[];
  ingredients: RecipeIngredient[];
  tags: string[];
  images: RecipeImage[];
}

export interface RecipeSearchQuery {
  q?: string | undefined;
  tag?: string | undefined;
  ingredient?: string | undefined;
}

/**
 * A recipe produced by the generator or the digitiser before the user
 * (or the generator itself) saves it.
 */
export interface RecipeDraft {
  title: string;
  summary: string;
  servings: number | null;
  total_time_minutes: number | null;
  ingredients: RecipeIngredient[];
  steps: string[];
  notes: string[];
  tags: string[];
}

export interface OcrResult {
  text: string;
  draft: RecipeDraft | null;
}

import type { RecipeImage } from '@magic-chef/shared';
import { BaseRepository } from './base.repository.js';

export interface CreateRecipeImageData {
  recipe_id: number;
  storage_key: string;
  alt_text: string;
  content_type: string;
  size_bytes: number;
}

/** A file already in storage, not yet linked to a recipe. */
export type StoredImage = Omit<CreateRecipeImageData, 'recipe_id'>;

export class RecipeImageRepository extends BaseRepository {
  create(data: CreateRecipeImageData): RecipeImage {
    const created_at = this.now();
    const result = this.db
      .prepare(
        `INSERT INTO recipe_images (recipe_id, storage_key, alt_text, content_type, size_bytes, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        data.recipe_id,
        data.storage_key,
        data.alt_text,
        data.content_type,
        data.size_bytes,
        created_at
      );
    return { id: Number(result.lastInsertRowid), ...data, created_at };
  }

  findById(id: number): RecipeImage | null {
    return (
      this.db
        .prepare<[number], RecipeImage>('SELECT * FROM recipe_images WHERE id = ?')
        .get(id) ?? null
    );
  }

  findByRecipeId(recipeId: number): RecipeImage[] {
    return this.db
      .prepare<[number], RecipeImage>(
        'SELECT * FROM recipe_images WHERE recipe_id = ? ORDER BY id'
      )
      .all(recipeId);
  }

  delete(id: number): boolean {
    const result = this.db.prepare('DELETE FROM recipe_images WHERE id = ?').run(id);
    return result.changes > 0;
  }
}

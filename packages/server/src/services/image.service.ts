import { randomUUID } from 'node:crypto';
import { info, warn } from 'firebase-functions/logger';
import type { RecipeImage } from '@magic-chef/shared';
import type { RecipeImageRepository, RecipeRepository, StoredImage } from '../repositories/index.js';
import type { StorageProvider } from '../providers/index.js';
import { ForbiddenError, NotFoundError, ProviderError } from '../types/errors.js';

export const IMAGE_EXTENSIONS: Record<string, string> = {
  'image/png': '.png',
  'image/jpeg': '.jpg',
  'image/gif': '.gif',
  'image/webp': '.webp',
};

export interface UploadedImage {
  data: Buffer;
  contentType: string;
  altText?: string;
}

export interface RecipeImageView extends RecipeImage {
  url: string;
}

export class ImageService {
  constructor(
    private readonly recipes: RecipeRepository,
    private readonly images: RecipeImageRepository,
    private readonly storage: StorageProvider
  ) {}

  async upload(userId: number, recipeId: number, image: UploadedImage): Promise<RecipeImage> {
    this.requireOwner(userId, recipeId);
    const stored = await this.store(image);
    try {
      const created = this.images.create({ recipe_id: recipeId, ...stored });
      this.recipes.touch(recipeId);
      info('image:uploaded', { recipe_id: recipeId, image_id: created.id, bytes: created.size_bytes });
      return created;
    } catch (error) {
      await this.deleteStoredFiles([stored]);
      throw error;
    }
  }

  /**
   * Puts the file in storage without linking it to a recipe. The caller
   * writes the row, or hands the result to deleteStoredFiles when that fails.
   */
  async store(image: UploadedImage): Promise<StoredImage> {
    const extension = IMAGE_EXTENSIONS[image.contentType] ?? '';
    const key = `recipes/${randomUUID()}${extension}`;
    try {
      await this.storage.save(key, image.data, image.contentType);
    } catch (error) {
      throw ProviderError.from(this.storage.name, error);
    }
    return {
      storage_key: key,
      alt_text: image.altText ?? '',
      content_type: image.contentType,
      size_bytes: image.data.length,
    };
  }

  /** Removes the row and the stored file; returns the recipe id. */
  async delete(userId: number, imageId: number): Promise<number> {
    const image = this.images.findById(imageId);
    if (!image) {
      throw new NotFoundError('Image', imageId);
    }
    this.requireOwner(userId, image.recipe_id);

    this.images.delete(imageId);
    this.recipes.touch(image.recipe_id);
    await this.deleteStoredFiles([image]);
    return image.recipe_id;
  }

  /**
   * Best effort: the rows are already gone, so a storage failure only
   * leaves an orphaned file behind.
   */
  async deleteStoredFiles(images: readonly StoredImage[]): Promise<void> {
    for (const image of images) {
      try {
        await this.storage.delete(image.storage_key);
      } catch (error) {
        warn('image:delete_failed', {
          storage_key: image.storage_key,
          error_message: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    }
  }

  withUrl(image: RecipeImage): RecipeImageView {
    return { ...image, url: this.storage.publicUrl(image.storage_key) };
  }

  private requireOwner(userId: number, recipeId: number): void {
    const recipe = this.recipes.findById(recipeId);
    if (!recipe) {
      throw new NotFoundError('Recipe', recipeId);
    }
    if (recipe.user_id !== userId) {
      throw new ForbiddenError('You can only change images of your own recipes');
    }
  }
}

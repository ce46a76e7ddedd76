import { info } from 'firebase-functions/logger';
import type {
  CreateRecipeDTO,
  Recipe,
  RecipeSortField,
  RecipeWithDetails,
  SortOrder,
  UpdateRecipeDTO,
} from '@magic-chef/shared';
import type { RecipeImageRepository, RecipeRepository, StoredImage } from '../repositories/index.js';
import { ConflictError, ForbiddenError, NotFoundError } from '../types/errors.js';
import type { ImageService, UploadedImage } from './image.service.js';

export class RecipeService {
  constructor(
    private readonly recipes: RecipeRepository,
    private readonly images: RecipeImageRepository,
    private readonly imageService: ImageService
  ) {}

  create(userId: number, input: CreateRecipeDTO, image?: StoredImage): RecipeWithDetails {
    const recipe = this.recipes.create(userId, input, { image });
    info('recipe:created', { recipe_id: recipe.id, user_id: userId, with_image: image !== undefined });
    return recipe;
  }

  /** Create from a form that may carry an image; a storage failure saves nothing. */
  async createWithUpload(
    userId: number,
    input: CreateRecipeDTO,
    upload: UploadedImage | undefined
  ): Promise<RecipeWithDetails> {
    return this.withStoredUpload(upload, (image) => this.create(userId, input, image));
  }

  /** Update from a form that may carry an image; a storage failure changes nothing. */
  async updateWithUpload(
    userId: number,
    id: number,
    input: UpdateRecipeDTO,
    upload: UploadedImage | undefined
  ): Promise<RecipeWithDetails> {
    this.getOwned(userId, id);
    return this.withStoredUpload(upload, (image) => this.update(userId, id, input, image));
  }

  /** Owners always see their recipes; everyone else only public ones. */
  get(viewerId: number | null, id: number): RecipeWithDetails {
    const recipe = this.recipes.findWithDetails(id);
    if (!recipe) {
      throw new NotFoundError('Recipe', id);
    }
    if (recipe.user_id !== viewerId && !recipe.is_public) {
      throw new ForbiddenError('You do not have access to this recipe');
    }
    return recipe;
  }

  getOwned(userId: number, id: number): RecipeWithDetails {
    const recipe = this.recipes.findWithDetails(id);
    if (!recipe) {
      throw new NotFoundError('Recipe', id);
    }
    if (recipe.user_id !== userId) {
      throw new ForbiddenError('You can only change your own recipes');
    }
    return recipe;
  }

  update(userId: number, id: number, input: UpdateRecipeDTO, image?: StoredImage): RecipeWithDetails {
    this.getOwned(userId, id);
    const updated = this.recipes.update(id, input, image);
    if (!updated) {
      throw new NotFoundError('Recipe', id);
    }
    info('recipe:updated', { recipe_id: id, user_id: userId });
    return updated;
  }

  async delete(userId: number, id: number): Promise<void> {
    const recipe = this.getOwned(userId, id);
    this.recipes.delete(id);
    await this.imageService.deleteStoredFiles(recipe.images);
    info('recipe:deleted', { recipe_id: id, user_id: userId, images: recipe.images.length });
  }

  /**
   * Save someone else's public recipe into the caller's collection.
   * Images stay with the source recipe.
   */
  copy(userId: number, id: number): RecipeWithDetails {
    const source = this.get(userId, id);
    if (source.user_id === userId) {
      throw new ConflictError('This recipe is already in your collection');
    }

    const lineageId = source.original_id ?? source.id;
    if (this.recipes.findInLineage(userId, lineageId, source.language)) {
      throw new ConflictError('You already saved a copy of this recipe');
    }

    const copy = this.recipes.create(
      userId,
      {
        title: source.title,
        summary: source.summary,
        language: source.language,
        servings: source.servings,
        total_time_minutes: source.total_time_minutes,
        steps: source.steps.map((step) => step.instruction),
        ingredients: source.ingredients,
        notes: source.notes,
        tags: source.tags,
        is_public: false,
      },
      { original_id: lineageId }
    );
    info('recipe:copied', { recipe_id: copy.id, source_id: source.id, user_id: userId });
    return copy;
  }

  listForUser(userId: number, sort: RecipeSortField = 'created_at', order: SortOrder = 'desc'): Recipe[] {
    return this.recipes.findByUser(userId, sort, order);
  }

  /** The caller's recipes, oldest first, or only the listed ones they own. */
  listForExport(userId: number, ids?: readonly number[]): RecipeWithDetails[] {
    const selected =
      ids === undefined
        ? this.recipes.findByUser(userId, 'created_at', 'asc').map((recipe) => recipe.id)
        : this.recipes.filterOwned(userId, ids);
    return this.recipes.findManyWithDetails(selected);
  }

  /** Deletes the caller's recipes among ids; others are ignored. */
  async bulkDelete(userId: number, ids: readonly number[]): Promise<number> {
    const owned = this.recipes.filterOwned(userId, ids);
    for (const id of owned) {
      const images = this.images.findByRecipeId(id);
      this.recipes.delete(id);
      await this.imageService.deleteStoredFiles(images);
    }
    info('recipe:bulk_deleted', { user_id: userId, requested: ids.length, deleted: owned.length });
    return owned.length;
  }

  /** Returns how many of the caller's recipes gained the tag. */
  bulkTag(userId: number, ids: readonly number[], tag: string): number {
    const owned = this.recipes.filterOwned(userId, ids);
    const tagged = this.recipes.addTag(owned, tag);
    info('recipe:bulk_tagged', { user_id: userId, tag, tagged });
    return tagged;
  }

  // The file goes to storage first so the rows can be written in one transaction
  private async withStoredUpload(
    upload: UploadedImage | undefined,
    write: (image: StoredImage | undefined) => RecipeWithDetails
  ): Promise<RecipeWithDetails> {
    const image = upload ? await this.imageService.store(upload) : undefined;
    try {
      return write(image);
    } catch (error) {
      if (image) {
        await this.imageService.deleteStoredFiles([image]);
      }
      throw error;
    }
  }
}

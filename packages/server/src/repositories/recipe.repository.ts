import type { Database } from 'better-sqlite3';
import {
  isSupportedLanguage,
  type CreateRecipeDTO,
  type LanguageCode,
  type Recipe,
  type RecipeSortField,
  type RecipeWithDetails,
  type SortOrder,
  type UpdateRecipeDTO,
} from '@magic-chef/shared';
import { BaseRepository, parseStringArray } from './base.repository.js';
import { RecipeStepRepository } from './recipe-step.repository.js';
import { RecipeIngredientRepository } from './recipe-ingredient.repository.js';
import { TagRepository } from './tag.repository.js';
import { RecipeImageRepository, type StoredImage } from './recipe-image.repository.js';
import { RecipeSearchRepository } from './recipe-search.repository.js';

interface RecipeRow {
  id: number;
  user_id: number;
  title: string;
  summary: string;
  language: string;
  servings: number;
  total_time_minutes: number | null;
  notes: string;
  is_public: number;
  original_id: number | null;
  created_at: string;
  updated_at: string;
}

export interface CreateRecipeOptions {
  /** Lineage root; defaults to the new recipe's own id */
  original_id?: number | null;
  /** Linked to the recipe inside the creating transaction */
  image?: StoredImage;
}

const SORT_COLUMNS: Record<RecipeSortField, string> = {
  title: 'title COLLATE NOCASE',
  servings: 'servings',
  created_at: 'created_at',
  updated_at: 'updated_at',
};

function toRecipe(row: RecipeRow): Recipe {
  return {
    id: row.id,
    user_id: row.user_id,
    title: row.title,
    summary: row.summary,
    language: isSupportedLanguage(row.language) ? row.language : 'en',
    servings: row.servings,
    total_time_minutes: row.total_time_minutes,
    notes: parseStringArray(row.notes),
    is_public: row.is_public === 1,
    original_id: row.original_id,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/**
 * Recipes with their steps, ingredients and tags. Every write keeps the
 * full-text index in step, inside the same transaction.
 */
export class RecipeRepository extends BaseRepository {
  private readonly steps: RecipeStepRepository;
  private readonly ingredients: RecipeIngredientRepository;
  private readonly tags: TagRepository;
  private readonly images: RecipeImageRepository;
  private readonly searchIndex: RecipeSearchRepository;

  constructor(db: Database) {
    super(db);
    this.steps = new RecipeStepRepository(db);
    this.ingredients = new RecipeIngredientRepository(db);
    this.tags = new TagRepository(db);
    this.images = new RecipeImageRepository(db);
    this.searchIndex = new RecipeSearchRepository(db);
  }

  create(userId: number, data: CreateRecipeDTO, options: CreateRecipeOptions = {}): RecipeWithDetails {
    const id = this.transaction(() => {
      const now = this.now();
      const result = this.db
        .prepare(
          `INSERT INTO recipes (user_id, title, summary, language, servings, total_time_minutes,
                                notes, is_public, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          userId,
          data.title,
          data.summary,
          data.language,
          data.servings,
          data.total_time_minutes,
          JSON.stringify(data.notes),
          data.is_public ? 1 : 0,
          now,
          now
        );
      const recipeId = Number(result.lastInsertRowid);

      this.db
        .prepare('UPDATE recipes SET original_id = ? WHERE id = ?')
        .run(options.original_id === undefined ? recipeId : options.original_id, recipeId);
      this.steps.replaceForRecipe(recipeId, data.steps);
      this.ingredients.replaceForRecipe(recipeId, data.ingredients);
      this.tags.setForRecipe(recipeId, data.tags);
      if (options.image) {
        this.images.create({ recipe_id: recipeId, ...options.image });
      }
      this.searchIndex.index(recipeId);
      return recipeId;
    });

    const created = this.findWithDetails(id);
    if (!created) {
      throw new Error('Failed to create recipe');
    }
    return created;
  }

  findById(id: number): Recipe | null {
    const row = this.db
      .prepare<[number], RecipeRow>('SELECT * FROM recipes WHERE id = ?')
      .get(id);
    return row ? toRecipe(row) : null;
  }

  findWithDetails(id: number): RecipeWithDetails | null {
    const recipe = this.findById(id);
    if (!recipe) {
      return null;
    }
    return {
      ...recipe,
      steps: this.steps.findByRecipeId(id),
      ingredients: this.ingredients.findByRecipeId(id),
      tags: this.tags.findByRecipeId(id),
      images: this.images.findByRecipeId(id),
    };
  }

  findManyWithDetails(ids: readonly number[]): RecipeWithDetails[] {
    const recipes: RecipeWithDetails[] = [];
    for (const id of ids) {
      const recipe = this.findWithDetails(id);
      if (recipe) {
        recipes.push(recipe);
      }
    }
    return recipes;
  }

  findByUser(userId: number, sort: RecipeSortField = 'created_at', order: SortOrder = 'desc'): Recipe[] {
    const direction = order === 'asc' ? 'ASC' : 'DESC';
    return this.db
      .prepare<[number], RecipeRow>(
        `SELECT * FROM recipes WHERE user_id = ?
         ORDER BY ${SORT_COLUMNS[sort]} ${direction}, id ${direction}`
      )
      .all(userId)
      .map(toRecipe);
  }

  /**
   * A recipe of userId in the given lineage and language: the root itself
   * or a copy of it. Translations differ in language and do not count.
   */
  findInLineage(userId: number, lineageId: number, language: LanguageCode): Recipe | null {
    const row = this.db
      .prepare<[number, number, number, string], RecipeRow>(
        `SELECT * FROM recipes
         WHERE user_id = ? AND (id = ? OR original_id = ?) AND language = ?
         ORDER BY id LIMIT 1`
      )
      .get(userId, lineageId, lineageId, language);
    return row ? toRecipe(row) : null;
  }

  /** An image passed in is linked inside the same transaction as the update. */
  update(id: number, data: UpdateRecipeDTO, image?: StoredImage): RecipeWithDetails | null {
    const existing = this.findById(id);
    if (!existing) {
      return null;
    }

    this.transaction(() => {
      const updates: string[] = [];
      const values: (string | number | null)[] = [];

      if (data.title !== undefined) {
        updates.push('title = ?');
        values.push(data.title);
      }
      if (data.summary !== undefined) {
        updates.push('summary = ?');
        values.push(data.summary);
      }
      if (data.language !== undefined) {
        updates.push('language = ?');
        values.push(data.language);
      }
      if (data.servings !== undefined) {
        updates.push('servings = ?');
        values.push(data.servings);
      }
      if (data.total_time_minutes !== undefined) {
        updates.push('total_time_minutes = ?');
        values.push(data.total_time_minutes);
      }
      if (data.notes !== undefined) {
        updates.push('notes = ?');
        values.push(JSON.stringify(data.notes));
      }
      if (data.is_public !== undefined) {
        updates.push('is_public = ?');
        values.push(data.is_public ? 1 : 0);
      }

      updates.push('updated_at = ?');
      values.push(this.now());
      values.push(id);
      this.db.prepare(`UPDATE recipes SET ${updates.join(', ')} WHERE id = ?`).run(...values);

      if (data.steps !== undefined) {
        this.steps.replaceForRecipe(id, data.steps);
      }
      if (data.ingredients !== undefined) {
        this.ingredients.replaceForRecipe(id, data.ingredients);
      }
      if (data.tags !== undefined) {
        this.tags.setForRecipe(id, data.tags);
      }
      if (image) {
        this.images.create({ recipe_id: id, ...image });
      }
      this.searchIndex.index(id);
    });

    return this.findWithDetails(id);
  }

  touch(id: number): void {
    this.db.prepare('UPDATE recipes SET updated_at = ? WHERE id = ?').run(this.now(), id);
  }

  /** Cascades to steps, ingredients, images and tag links; tags stay. */
  delete(id: number): boolean {
    return this.transaction(() => {
      this.searchIndex.remove(id);
      const result = this.db.prepare('DELETE FROM recipes WHERE id = ?').run(id);
      return result.changes > 0;
    });
  }

  /** Ids from the list that belong to userId, in the given order. */
  filterOwned(userId: number, ids: readonly number[]): number[] {
    const owned = this.db.prepare<[number, number], { id: number }>(
      'SELECT id FROM recipes WHERE id = ? AND user_id = ?'
    );
    return [...new Set(ids)].filter((id) => owned.get(id, userId) !== undefined);
  }

  /** Tag every listed recipe; returns how many gained the tag. */
  addTag(ids: readonly number[], tag: string): number {
    return this.transaction(() => {
      let tagged = 0;
      for (const id of ids) {
        if (this.tags.addToRecipe(id, tag)) {
          tagged += 1;
          this.touch(id);
          this.searchIndex.index(id);
        }
      }
      return tagged;
    });
  }
}

import type { RecipeStep } from '@magic-chef/shared';
import { BaseRepository } from './base.repository.js';

export class RecipeStepRepository extends BaseRepository {
  findByRecipeId(recipeId: number): RecipeStep[] {
    return this.db
      .prepare<[number], RecipeStep>(
        `SELECT position, instruction FROM recipe_steps
         WHERE recipe_id = ? ORDER BY position`
      )
      .all(recipeId);
  }

  /**
   * Rewrite every step of a recipe so positions run 1..n with no gaps.
   */
  replaceForRecipe(recipeId: number, instructions: readonly string[]): void {
    this.transaction(() => {
      this.db.prepare('DELETE FROM recipe_steps WHERE recipe_id = ?').run(recipeId);
      const insert = this.db.prepare(
        'INSERT INTO recipe_steps (recipe_id, position, instruction) VALUES (?, ?, ?)'
      );
      instructions.forEach((instruction, index) => {
        insert.run(recipeId, index + 1, instruction);
      });
    });
  }

  countByRecipeId(recipeId: number): number {
    const row = this.db
      .prepare<[number], { count: number }>(
        'SELECT COUNT(*) AS count FROM recipe_steps WHERE recipe_id = ?'
      )
      .get(recipeId);
    return row?.count ?? 0;
  }
}

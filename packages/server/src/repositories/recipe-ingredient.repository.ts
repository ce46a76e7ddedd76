import type { RecipeIngredient } from '@magic-chef/shared';
import { BaseRepository } from './base.repository.js';

export class RecipeIngredientRepository extends BaseRepository {
  findByRecipeId(recipeId: number): RecipeIngredient[] {
    return this.db
      .prepare<[number], RecipeIngredient>(
        `SELECT name, quantity FROM recipe_ingredients
         WHERE recipe_id = ? ORDER BY position`
      )
      .all(recipeId);
  }

  replaceForRecipe(recipeId: number, ingredients: readonly RecipeIngredient[]): void {
    this.transaction(() => {
      this.db.prepare('DELETE FROM recipe_ingredients WHERE recipe_id = ?').run(recipeId);
      const insert = this.db.prepare(
        `INSERT INTO recipe_ingredients (recipe_id, position, name, quantity)
         VALUES (?, ?, ?, ?)`
      );
      ingredients.forEach((ingredient, index) => {
        insert.run(recipeId, index + 1, ingredient.name, ingredient.quantity);
      });
    });
  }
}

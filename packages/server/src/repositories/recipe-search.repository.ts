import type { RecipeSearchQuery } from '@magic-chef/shared';
import { BaseRepository, parseStringArray } from './base.repository.js';

interface IndexSourceRow {
  title: string;
  summary: string;
  notes: string;
}

/**
 * Build an FTS5 query where every word is a required prefix term.
 * Returns null when the text holds no searchable word.
 */
export function toMatchQuery(text: string): string | null {
  const tokens = text.match(/[\p{L}\p{N}]+/gu);
  if (!tokens || tokens.length === 0) {
    return null;
  }
  return tokens.map((token) => `"${token}"*`).join(' ');
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Maintains recipes_fts (rowid = recipes.id) and runs recipe searches.
 */
export class RecipeSearchRepository extends BaseRepository {
  /** Rebuild the index row of one recipe from its current rows. */
  index(recipeId: number): void {
    const recipe = this.db
      .prepare<[number], IndexSourceRow>('SELECT title, summary, notes FROM recipes WHERE id = ?')
      .get(recipeId);

    this.remove(recipeId);
    if (!recipe) {
      return;
    }

    const ingredients = this.db
      .prepare<[number], { text: string }>(
        `SELECT name || ' ' || quantity AS text FROM recipe_ingredients
         WHERE recipe_id = ? ORDER BY position`
      )
      .all(recipeId)
      .map((row) => row.text);
    const steps = this.db
      .prepare<[number], { instruction: string }>(
        'SELECT instruction FROM recipe_steps WHERE recipe_id = ? ORDER BY position'
      )
      .all(recipeId)
      .map((row) => row.instruction);
    const tags = this.db
      .prepare<[number], { name: string }>(
        `SELECT t.name FROM tags t JOIN recipe_tags rt ON rt.tag_id = t.id
         WHERE rt.recipe_id = ?`
      )
      .all(recipeId)
      .map((row) => row.name);

    this.db
      .prepare(
        `INSERT INTO recipes_fts (rowid, title, summary, ingredients, steps, notes, tags)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        recipeId,
        recipe.title,
        recipe.summary,
        ingredients.join('\n'),
        steps.join('\n'),
        parseStringArray(recipe.notes).join('\n'),
        tags.join(' ')
      );
  }

  remove(recipeId: number): void {
    this.db.prepare('DELETE FROM recipes_fts WHERE rowid = ?').run(recipeId);
  }

  /**
   * Ids of visible recipes matching ANY of the given criteria. Text matches
   * come first by bm25 rank, then newest update, then lowest id.
   */
  search(query: RecipeSearchQuery, viewerId: number | null): number[] {
    const params: Record<string, string | number | null> = { viewer: viewerId };
    const criteria: string[] = [];

    const match = query.q !== undefined ? toMatchQuery(query.q) : null;
    if (match !== null) {
      params['match'] = match;
      criteria.push('f.rowid IS NOT NULL');
    }

    const tag = query.tag?.trim();
    if (tag) {
      params['tag'] = tag;
      criteria.push(
        `EXISTS (SELECT 1 FROM recipe_tags rt JOIN tags t ON t.id = rt.tag_id
                 WHERE rt.recipe_id = r.id AND t.name = :tag)`
      );
    }

    const ingredient = query.ingredient?.trim();
    if (ingredient) {
      params['ingredient'] = `%${escapeLike(ingredient)}%`;
      criteria.push(
        `EXISTS (SELECT 1 FROM recipe_ingredients ri
                 WHERE ri.recipe_id = r.id AND ri.name LIKE :ingredient ESCAPE '\\')`
      );
    }

    if (criteria.length === 0) {
      return [];
    }

    const ftsJoin =
      match !== null
        ? `LEFT JOIN (SELECT rowid, bm25(recipes_fts) AS score FROM recipes_fts
                      WHERE recipes_fts MATCH :match) f ON f.rowid = r.id`
        : 'LEFT JOIN (SELECT NULL AS rowid, NULL AS score) f ON 0';

    return this.db
      .prepare<Record<string, string | number | null>, { id: number }>(
        `SELECT r.id FROM recipes r
         ${ftsJoin}
         WHERE (r.is_public = 1 OR r.user_id = :viewer)
           AND (${criteria.join(' OR ')})
         ORDER BY f.score IS NULL, f.score, r.updated_at DESC, r.id ASC`
      )
      .all(params)
      .map((row) => row.id);
  }
}

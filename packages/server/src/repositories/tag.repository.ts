import { BaseRepository } from './base.repository.js';

export interface Tag {
  id: number;
  name: string;
}

export class TagRepository extends BaseRepository {
  findByName(name: string): Tag | null {
    return (
      this.db
        .prepare<[string], Tag>('SELECT id, name FROM tags WHERE name = ?')
        .get(name) ?? null
    );
  }

  findOrCreate(name: string): Tag {
    const existing = this.findByName(name);
    if (existing) {
      return existing;
    }
    const result = this.db.prepare('INSERT INTO tags (name) VALUES (?)').run(name);
    return { id: Number(result.lastInsertRowid), name };
  }

  findAll(): Tag[] {
    return this.db.prepare<[], Tag>('SELECT id, name FROM tags ORDER BY name').all();
  }

  findByRecipeId(recipeId: number): string[] {
    return this.db
      .prepare<[number], { name: string }>(
        `SELECT t.name FROM tags t
         JOIN recipe_tags rt ON rt.tag_id = t.id
         WHERE rt.recipe_id = ?
         ORDER BY t.name`
      )
      .all(recipeId)
      .map((row) => row.name);
  }

  setForRecipe(recipeId: number, names: readonly string[]): void {
    this.transaction(() => {
      this.db.prepare('DELETE FROM recipe_tags WHERE recipe_id = ?').run(recipeId);
      for (const name of new Set(names)) {
        this.addToRecipe(recipeId, name);
      }
    });
  }

  /** Returns false when the recipe already carried the tag. */
  addToRecipe(recipeId: number, name: string): boolean {
    const tag = this.findOrCreate(name);
    const result = this.db
      .prepare('INSERT OR IGNORE INTO recipe_tags (recipe_id, tag_id) VALUES (?, ?)')
      .run(recipeId, tag.id);
    return result.changes > 0;
  }

  /**
   * Names of tags used by at least one recipe the viewer can see.
   * Anonymous viewers only see tags of public recipes.
   */
  findVisibleNames(viewerId: number | null): string[] {
    return this.db
      .prepare<{ viewer: number | null }, { name: string }>(
        `SELECT DISTINCT t.name FROM tags t
         JOIN recipe_tags rt ON rt.tag_id = t.id
         JOIN recipes r ON r.id = rt.recipe_id
         WHERE r.is_public = 1 OR r.user_id = :viewer
         ORDER BY t.name`
      )
      .all({ viewer: viewerId })
      .map((row) => row.name);
  }
}

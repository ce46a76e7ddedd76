import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 3,
  name: 'create_tags',

  up(db: Database): void {
    // Tags are shared between recipes; only the join rows follow a recipe
    db.exec(`
      CREATE TABLE tags (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE COLLATE NOCASE
      );

      CREATE TABLE recipe_tags (
        recipe_id INTEGER NOT NULL REFERENCES recipes(id) ON DELETE CASCADE,
        tag_id INTEGER NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
        PRIMARY KEY (recipe_id, tag_id)
      );

      CREATE INDEX idx_recipe_tags_tag_id ON recipe_tags(tag_id);
    `);
  },

  down(db: Database): void {
    db.exec(`
      DROP TABLE IF EXISTS recipe_tags;
      DROP TABLE IF EXISTS tags;
    `);
  },
};

import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 4,
  name: 'create_recipe_images',

  up(db: Database): void {
    db.exec(`
      CREATE TABLE recipe_images (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        recipe_id INTEGER NOT NULL REFERENCES recipes(id) ON DELETE CASCADE,
        storage_key TEXT NOT NULL UNIQUE,
        alt_text TEXT NOT NULL DEFAULT '',
        content_type TEXT NOT NULL,
        size_bytes INTEGER NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE INDEX idx_recipe_images_recipe_id ON recipe_images(recipe_id);
    `);
  },

  down(db: Database): void {
    db.exec('DROP TABLE IF EXISTS recipe_images');
  },
};

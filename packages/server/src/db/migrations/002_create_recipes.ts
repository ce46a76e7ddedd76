import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 2,
  name: 'create_recipes',

  up(db: Database): void {
    // Steps and ingredients are ordered by position; the unique index keeps
    // step positions from colliding while a recipe is rewritten
    db.exec(`
      CREATE TABLE recipes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        title TEXT NOT NULL CHECK (length(trim(title)) > 0),
        summary TEXT NOT NULL DEFAULT '',
        language TEXT NOT NULL DEFAULT 'en',
        servings INTEGER NOT NULL DEFAULT 4 CHECK (servings > 0),
        total_time_minutes INTEGER CHECK (total_time_minutes IS NULL OR total_time_minutes >= 0),
        notes TEXT NOT NULL DEFAULT '[]',
        is_public INTEGER NOT NULL DEFAULT 0,
        original_id INTEGER REFERENCES recipes(id) ON DELETE SET NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX idx_recipes_user_id ON recipes(user_id);
      CREATE INDEX idx_recipes_original_id ON recipes(original_id);
      CREATE INDEX idx_recipes_public ON recipes(is_public);

      CREATE TABLE recipe_steps (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        recipe_id INTEGER NOT NULL REFERENCES recipes(id) ON DELETE CASCADE,
        position INTEGER NOT NULL CHECK (position > 0),
        instruction TEXT NOT NULL,
        UNIQUE (recipe_id, position)
      );

      CREATE TABLE recipe_ingredients (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        recipe_id INTEGER NOT NULL REFERENCES recipes(id) ON DELETE CASCADE,
        position INTEGER NOT NULL,
        name TEXT NOT NULL,
        quantity TEXT NOT NULL DEFAULT ''
      );

      CREATE INDEX idx_recipe_ingredients_recipe_id ON recipe_ingredients(recipe_id);
    `);
  },

  down(db: Database): void {
    db.exec(`
      DROP TABLE IF EXISTS recipe_ingredients;
      DROP TABLE IF EXISTS recipe_steps;
      DROP TABLE IF EXISTS recipes;
    `);
  },
};

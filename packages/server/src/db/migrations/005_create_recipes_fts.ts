import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 5,
  name: 'create_recipes_fts',

  up(db: Database): void {
    // rowid mirrors recipes.id; the recipe repository keeps it in sync
    db.exec(`
      CREATE VIRTUAL TABLE recipes_fts USING fts5(
        title,
        summary,
        ingredients,
        steps,
        notes,
        tags,
        tokenize = 'unicode61 remove_diacritics 2'
      );
    `);
  },

  down(db: Database): void {
    db.exec('DROP TABLE IF EXISTS recipes_fts');
  },
};

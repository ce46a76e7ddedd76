import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 1,
  name: 'create_users',

  up(db: Database): void {
    db.exec(`
      CREATE TABLE users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        username TEXT NOT NULL UNIQUE COLLATE NOCASE,
        email TEXT NOT NULL UNIQUE COLLATE NOCASE,
        password_hash TEXT NOT NULL,
        first_name TEXT,
        last_name TEXT,
        language TEXT NOT NULL DEFAULT 'en',
        created_at TEXT NOT NULL
      );
    `);
  },

  down(db: Database): void {
    db.exec('DROP TABLE IF EXISTS users');
  },
};

import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 6,
  name: 'create_sessions',

  up(db: Database): void {
    db.exec(`
      CREATE TABLE sessions (
        sid TEXT PRIMARY KEY,
        data TEXT NOT NULL,
        expires_at INTEGER NOT NULL
      );

      CREATE INDEX idx_sessions_expires_at ON sessions(expires_at);
    `);
  },

  down(db: Database): void {
    db.exec('DROP TABLE IF EXISTS sessions');
  },
};

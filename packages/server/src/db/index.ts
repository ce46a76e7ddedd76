import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { info } from 'firebase-functions/logger';
import { Migrator } from './migrator.js';
import { migrations } from './migrations/index.js';

/**
 * Open a connection with the pragmas every connection needs.
 * Pass ':memory:' for an in-process database.
 */
export function openDatabase(filename: string): Database.Database {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const connection = new Database(filename);
  connection.pragma('foreign_keys = ON');
  if (filename !== ':memory:') {
    connection.pragma('journal_mode = WAL');
  }
  return connection;
}

export function runMigrations(connection: Database.Database): number[] {
  return new Migrator(connection, migrations).up();
}

/**
 * Open the application database and bring its schema up to date.
 * A failed migration throws; the caller treats that as fatal.
 */
export function initializeDatabase(filename: string): Database.Database {
  const connection = openDatabase(filename);
  const applied = runMigrations(connection);
  info('db:ready', { filename, migrations_applied: applied.length });
  return connection;
}

export function createTestDatabase(): Database.Database {
  const connection = openDatabase(':memory:');
  runMigrations(connection);
  return connection;
}

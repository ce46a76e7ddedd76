import type { Database } from 'better-sqlite3';
import { info } from 'firebase-functions/logger';

export interface Migration {
  version: number;
  name: string;
  up(db: Database): void;
  down(db: Database): void;
}

export interface AppliedMigration {
  version: number;
  name: string;
  applied_at: string;
}

export class MigrationError extends Error {
  constructor(
    public readonly migration: Migration,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Migration ${migration.version} (${migration.name}) failed: ${reason}`);
    this.name = 'MigrationError';
    this.cause = cause;
  }
}

/**
 * Applies numbered migrations in order, one transaction per migration.
 * Versions must be unique and are recorded in schema_migrations.
 */
export class Migrator {
  private readonly migrations: Migration[];

  constructor(
    private readonly db: Database,
    migrations: Migration[]
  ) {
    this.migrations = [...migrations].sort((a, b) => a.version - b.version);
    const versions = new Set<number>();
    for (const migration of this.migrations) {
      if (versions.has(migration.version)) {
        throw new Error(`Duplicate migration version ${migration.version}`);
      }
      versions.add(migration.version);
    }
    this.ensureMigrationsTable();
  }

  private ensureMigrationsTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL
      )
    `);
  }

  applied(): AppliedMigration[] {
    return this.db
      .prepare<[], AppliedMigration>(
        'SELECT version, name, applied_at FROM schema_migrations ORDER BY version'
      )
      .all();
  }

  currentVersion(): number {
    const row = this.db
      .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
      .get();
    return row?.version ?? 0;
  }

  pending(): Migration[] {
    const current = this.currentVersion();
    return this.migrations.filter((migration) => migration.version > current);
  }

  /** Apply every pending migration; returns the versions applied. */
  up(): number[] {
    const appliedVersions: number[] = [];
    const record = this.db.prepare<[number, string, string]>(
      'INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)'
    );

    for (const migration of this.pending()) {
      const apply = this.db.transaction(() => {
        migration.up(this.db);
        record.run(migration.version, migration.name, new Date().toISOString());
      });
      try {
        apply();
      } catch (error) {
        throw new MigrationError(migration, error);
      }
      info('db:migration_applied', { version: migration.version, name: migration.name });
      appliedVersions.push(migration.version);
    }

    return appliedVersions;
  }

  /** Roll back the most recent migration, if any. */
  down(): number | null {
    const current = this.currentVersion();
    const migration = this.migrations.find((m) => m.version === current);
    if (!migration) {
      return null;
    }

    const revert = this.db.transaction(() => {
      migration.down(this.db);
      this.db.prepare('DELETE FROM schema_migrations WHERE version = ?').run(migration.version);
    });
    try {
      revert();
    } catch (error) {
      throw new MigrationError(migration, error);
    }
    info('db:migration_reverted', { version: migration.version, name: migration.name });
    return migration.version;
  }
}

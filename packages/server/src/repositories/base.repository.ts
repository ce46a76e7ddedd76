import type { Database } from 'better-sqlite3';

export abstract class BaseRepository {
  constructor(protected readonly db: Database) {}

  /** Run fn atomically; nests as a savepoint inside an outer transaction. */
  protected transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  protected now(): string {
    return new Date().toISOString();
  }
}

/** Parse a JSON text column that holds a string array. */
export function parseStringArray(json: string): string[] {
  try {
    const value: unknown = JSON.parse(json);
    if (!Array.isArray(value)) {
      return [];
    }
    return value.filter((item): item is string => typeof item === 'string');
  } catch {
    return [];
  }
}

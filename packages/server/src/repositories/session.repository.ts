import { BaseRepository } from './base.repository.js';

interface SessionRow {
  data: string;
  expires_at: number;
}

export class SessionRepository extends BaseRepository {
  /** Serialized session data, or null when missing or expired. */
  find(sid: string, now: number = Date.now()): string | null {
    const row = this.db
      .prepare<[string], SessionRow>('SELECT data, expires_at FROM sessions WHERE sid = ?')
      .get(sid);
    if (!row || row.expires_at <= now) {
      return null;
    }
    return row.data;
  }

  upsert(sid: string, data: string, expiresAt: number): void {
    this.db
      .prepare(
        `INSERT INTO sessions (sid, data, expires_at) VALUES (?, ?, ?)
         ON CONFLICT(sid) DO UPDATE SET data = excluded.data, expires_at = excluded.expires_at`
      )
      .run(sid, data, expiresAt);
  }

  touch(sid: string, expiresAt: number): void {
    this.db.prepare('UPDATE sessions SET expires_at = ? WHERE sid = ?').run(expiresAt, sid);
  }

  delete(sid: string): void {
    this.db.prepare('DELETE FROM sessions WHERE sid = ?').run(sid);
  }

  deleteExpired(now: number = Date.now()): number {
    return this.db.prepare('DELETE FROM sessions WHERE expires_at <= ?').run(now).changes;
  }
}

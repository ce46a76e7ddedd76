import {
  isSupportedLanguage,
  type LanguageCode,
  type User,
  type UserWithPassword,
} from '@magic-chef/shared';
import { BaseRepository } from './base.repository.js';

interface UserRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  first_name: string | null;
  last_name: string | null;
  language: string;
  created_at: string;
}

export interface CreateUserData {
  username: string;
  email: string;
  password_hash: string;
  language?: LanguageCode;
}

export interface UpdateProfileData {
  first_name: string | null;
  last_name: string | null;
  email: string;
  language: LanguageCode;
}

function toUserWithPassword(row: UserRow): UserWithPassword {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    password_hash: row.password_hash,
    first_name: row.first_name,
    last_name: row.last_name,
    language: isSupportedLanguage(row.language) ? row.language : 'en',
    created_at: row.created_at,
  };
}

function toUser(row: UserRow): User {
  const { password_hash: _hash, ...user } = toUserWithPassword(row);
  return user;
}

export class UserRepository extends BaseRepository {
  create(data: CreateUserData): User {
    const result = this.db
      .prepare(
        `INSERT INTO users (username, email, password_hash, language, created_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(data.username, data.email, data.password_hash, data.language ?? 'en', this.now());

    const user = this.findById(Number(result.lastInsertRowid));
    if (!user) {
      throw new Error('Failed to create user');
    }
    return user;
  }

  findById(id: number): User | null {
    const row = this.findRow('id = ?', id);
    return row ? toUser(row) : null;
  }

  findWithPasswordById(id: number): UserWithPassword | null {
    const row = this.findRow('id = ?', id);
    return row ? toUserWithPassword(row) : null;
  }

  findByUsername(username: string): UserWithPassword | null {
    const row = this.findRow('username = ?', username);
    return row ? toUserWithPassword(row) : null;
  }

  findByEmail(email: string): User | null {
    const row = this.findRow('email = ?', email);
    return row ? toUser(row) : null;
  }

  existsWithUsernameOrEmail(username: string, email: string): boolean {
    const row = this.db
      .prepare<[string, string], { id: number }>(
        'SELECT id FROM users WHERE username = ? OR email = ? LIMIT 1'
      )
      .get(username, email);
    return row !== undefined;
  }

  updateProfile(id: number, data: UpdateProfileData): User | null {
    this.db
      .prepare(
        `UPDATE users SET first_name = ?, last_name = ?, email = ?, language = ?
         WHERE id = ?`
      )
      .run(data.first_name, data.last_name, data.email, data.language, id);
    return this.findById(id);
  }

  updatePassword(id: number, passwordHash: string): boolean {
    const result = this.db
      .prepare('UPDATE users SET password_hash = ? WHERE id = ?')
      .run(passwordHash, id);
    return result.changes > 0;
  }

  private findRow(where: string, value: number | string): UserRow | undefined {
    return this.db
      .prepare<[number | string], UserRow>(`SELECT * FROM users WHERE ${where}`)
      .get(value);
  }
}

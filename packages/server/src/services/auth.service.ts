import Database from 'better-sqlite3';
import { info } from 'firebase-functions/logger';
import type {
  ChangePasswordInput,
  RegisterInput,
  UpdateProfileInput,
  User,
} from '@magic-chef/shared';
import type { UserRepository } from '../repositories/index.js';
import { ConflictError, NotFoundError, UnauthorizedError, ValidationError } from '../types/errors.js';
import { MISSING_USER_HASH, hashPassword, verifyPassword } from './password.js';

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code.startsWith('SQLITE_CONSTRAINT_UNIQUE');
}

export class AuthService {
  constructor(private readonly users: UserRepository) {}

  async register(input: RegisterInput): Promise<User> {
    // Hash first: nothing may yield between the check and the insert
    const password_hash = await hashPassword(input.password);
    if (this.users.existsWithUsernameOrEmail(input.username, input.email)) {
      throw new ConflictError('Username or email is already taken');
    }
    let user: User;
    try {
      user = this.users.create({ username: input.username, email: input.email, password_hash });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Username or email is already taken');
      }
      throw error;
    }
    info('auth:registered', { user_id: user.id });
    return user;
  }

  async login(username: string, password: string): Promise<User> {
    const user = this.users.findByUsername(username);
    const matches = await verifyPassword(password, user?.password_hash ?? MISSING_USER_HASH);
    if (!user || !matches) {
      throw new UnauthorizedError('Invalid username or password');
    }
    const { password_hash: _hash, ...publicUser } = user;
    return publicUser;
  }

  getUser(id: number): User | null {
    return this.users.findById(id);
  }

  async changePassword(userId: number, input: ChangePasswordInput): Promise<void> {
    const user = this.users.findWithPasswordById(userId);
    if (!user) {
      throw new NotFoundError('User', userId);
    }
    if (!(await verifyPassword(input.old_password, user.password_hash))) {
      throw new ValidationError('Current password is incorrect');
    }
    this.users.updatePassword(userId, await hashPassword(input.new_password));
    info('auth:password_changed', { user_id: userId });
  }

  updateProfile(userId: number, input: UpdateProfileInput): User {
    const owner = this.users.findByEmail(input.email);
    if (owner && owner.id !== userId) {
      throw new ConflictError('Email is already in use');
    }
    const user = this.users.updateProfile(userId, input);
    if (!user) {
      throw new NotFoundError('User', userId);
    }
    return user;
  }
}

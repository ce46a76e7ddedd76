import type { LanguageCode } from '../constants/languages.js';

export interface User {
  id: number;
  username: string;
  email: string;
  first_name: string | null;
  last_name: string | null;
  language: LanguageCode;
  created_at: string;
}

// Only the repository and the auth service ever see the hash
export interface UserWithPassword extends User {
  password_hash: string;
}

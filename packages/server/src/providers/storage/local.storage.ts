import fs from 'node:fs/promises';
import path from 'node:path';
import type { StorageProvider } from '../types.js';

export const LOCAL_UPLOADS_URL_PREFIX = '/uploads';

/** Files under UPLOAD_DIR, served by the app at /uploads. */
export class LocalStorage implements StorageProvider {
  readonly name = 'local';
  private readonly root: string;

  constructor(uploadDir: string) {
    this.root = path.resolve(uploadDir);
  }

  async save(key: string, data: Buffer): Promise<void> {
    const target = this.resolve(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, data);
  }

  async delete(key: string): Promise<void> {
    await fs.rm(this.resolve(key), { force: true });
  }

  publicUrl(key: string): string {
    return `${LOCAL_UPLOADS_URL_PREFIX}/${key.split('/').map(encodeURIComponent).join('/')}`;
  }

  private resolve(key: string): string {
    const target = path.resolve(this.root, key);
    if (!target.startsWith(this.root + path.sep)) {
      throw new Error(`Storage key escapes upload directory: ${key}`);
    }
    return target;
  }
}

import { getApps, initializeApp } from 'firebase-admin/app';
import { getStorage } from 'firebase-admin/storage';
import type { StorageProvider } from '../types.js';

/** Cloud Storage bucket through firebase-admin; objects are made public. */
export class FirebaseStorage implements StorageProvider {
  readonly name = 'firebase';

  constructor(private readonly bucketName: string) {
    if (getApps().length === 0) {
      initializeApp({ storageBucket: bucketName });
    }
  }

  async save(key: string, data: Buffer, contentType: string): Promise<void> {
    await this.bucket().file(key).save(data, { contentType, resumable: false, public: true });
  }

  async delete(key: string): Promise<void> {
    await this.bucket().file(key).delete({ ignoreNotFound: true });
  }

  publicUrl(key: string): string {
    return `https://storage.googleapis.com/${this.bucketName}/${key}`;
  }

  private bucket(): ReturnType<ReturnType<typeof getStorage>['bucket']> {
    return getStorage().bucket(this.bucketName);
  }
}

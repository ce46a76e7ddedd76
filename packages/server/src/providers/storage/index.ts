import type { AppConfig } from '../../config.js';
import type { StorageProvider } from '../types.js';
import { FirebaseStorage } from './firebase.storage.js';
import { LocalStorage } from './local.storage.js';

export { LocalStorage, LOCAL_UPLOADS_URL_PREFIX } from './local.storage.js';
export { FirebaseStorage } from './firebase.storage.js';

export function createStorageProvider(storage: AppConfig['storage']): StorageProvider {
  if (storage.provider === 'firebase' && storage.firebaseBucket !== undefined) {
    return new FirebaseStorage(storage.firebaseBucket);
  }
  return new LocalStorage(storage.uploadDir);
}

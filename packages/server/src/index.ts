import { error as logError, info } from 'firebase-functions/logger';
import { createApp } from './app.js';
import { loadConfig, loadEnvironment } from './config.js';
import { initializeDatabase } from './db/index.js';
import { createProviders } from './providers/index.js';

// Bad configuration or a failed migration stops the process before it listens
function main(): void {
  loadEnvironment();
  const config = loadConfig();
  const db = initializeDatabase(config.databasePath);
  const app = createApp({ config, db, providers: createProviders(config) });

  app.listen(config.port, (): void => {
    info('server:listening', {
      port: config.port,
      env: config.env,
      ai_provider: config.ai.provider,
      translation_provider: config.translation.provider,
      ocr_provider: config.ocr.provider,
      storage_provider: config.storage.provider,
    });
  });
}

try {
  main();
} catch (err) {
  logError('server:startup_failed', {
    error_message: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
}

import { error as logError, info } from 'firebase-functions/logger';
import { loadConfig, loadEnvironment } from '../config.js';
import { Migrator } from './migrator.js';
import { migrations } from './migrations/index.js';
import { openDatabase } from './index.js';

// Usage: npm run migrate [up|down|status]
function main(): void {
  loadEnvironment();
  const config = loadConfig();
  const command = process.argv[2] ?? 'up';
  const db = openDatabase(config.databasePath);
  const migrator = new Migrator(db, migrations);

  try {
    switch (command) {
      case 'up': {
        const applied = migrator.up();
        info('migrate:up', { applied, current_version: migrator.currentVersion() });
        break;
      }
      case 'down': {
        const reverted = migrator.down();
        info('migrate:down', { reverted, current_version: migrator.currentVersion() });
        break;
      }
      case 'status':
        info('migrate:status', {
          current_version: migrator.currentVersion(),
          applied: migrator.applied().map((m) => `${m.version}_${m.name} at ${m.applied_at}`),
          pending: migrator.pending().map((m) => `${m.version}_${m.name}`),
        });
        break;
      default:
        throw new Error(`Unknown command "${command}". Use up, down or status.`);
    }
  } finally {
    db.close();
  }
}

try {
  main();
} catch (err) {
  logError('migrate:failed', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
}

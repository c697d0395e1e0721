import { closeDb, createDb } from '../src/infrastructure/db.js';
import { loadConfig } from '../src/infrastructure/config.js';
import { migrateToLatest, rollbackAll } from '../src/infrastructure/schema.js';

/**
 * Apply (or with --rollback, revert) the ledger schema.
 * Reads DATABASE_URL / DB_CLIENT like the service does.
 */
async function migrate() {
  const config = loadConfig();
  const db = createDb({ client: config.database.client, connection: config.database.url });
  try {
    if (process.argv.includes('--rollback')) {
      await rollbackAll(db);
      console.log('⏪ Rolled back all migrations');
      return;
    }
    const applied = await migrateToLatest(db);
    if (applied.length === 0) {
      console.log('✨ Schema already up to date');
    } else {
      for (const name of applied) console.log(`  ✅ Applied: ${name}`);
    }
  } finally {
    await closeDb(db);
  }
}

migrate().catch((error) => {
  console.error('❌ Migration failed:', error);
  process.exit(1);
});

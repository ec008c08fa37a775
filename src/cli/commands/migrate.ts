import { openCacheDatabase } from '../../storage/database.js';
import { SCHEMA_VERSION, readAppliedMigrations } from '../../storage/migrations.js';
import { formatTimestamp, printKeyValue, printTable } from '../progress.js';

export interface MigrateCommandOptions {
  dbPath: string;
  json: boolean;
}

export async function migrateCommand(options: MigrateCommandOptions): Promise<void> {
  const { dbPath, json } = options;
  const db = await openCacheDatabase(dbPath);
  try {
    const migrations = readAppliedMigrations(db);
    if (json) {
      console.log(JSON.stringify({ dbPath, schemaVersion: SCHEMA_VERSION, migrations }, null, 2));
      return;
    }
    printKeyValue([
      { key: 'Database', value: dbPath },
      { key: 'Schema version', value: SCHEMA_VERSION },
    ]);
    console.log('');
    printTable(
      ['version', 'applied at', 'checksum'],
      migrations.map((migration) => [
        migration.version,
        formatTimestamp(new Date(migration.appliedAt)),
        migration.checksum.slice(0, 12),
      ])
    );
  } finally {
    db.close();
  }
}

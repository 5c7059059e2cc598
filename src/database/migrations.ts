import { Database } from 'sqlite';

/**
 * Database migration scripts for SQLite schema creation
 */

export interface Migration {
  version: number;
  name: string;
  up: (db: Database) => Promise<void>;
  down: (db: Database) => Promise<void>;
}

const MIGRATION_HISTORY = 'create_migration_history_table';

export const migrations: Migration[] = [
  {
    version: 1,
    name: MIGRATION_HISTORY,
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS migration_history (
          version INTEGER PRIMARY KEY,
          name TEXT NOT NULL,
          applied_at TEXT NOT NULL
        );
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS migration_history;');
    }
  },
  {
    version: 2,
    name: 'create_evaluations_table',
    up: async (db: Database) => {
      // AUTOINCREMENT keeps ids monotonic and never reuses one, even after deletes
      await db.exec(`
        CREATE TABLE IF NOT EXISTS evaluations (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          age INTEGER NOT NULL CHECK (age BETWEEN 1 AND 120),
          sex TEXT NOT NULL CHECK (sex IN ('M', 'F')),
          responses TEXT NOT NULL,
          consent INTEGER NOT NULL DEFAULT 0,
          probability REAL NOT NULL CHECK (probability >= 0 AND probability <= 1),
          created_at TEXT NOT NULL
        );
      `);

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_evaluations_created_at ON evaluations(created_at);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS evaluations;');
    }
  },
  {
    version: 3,
    name: 'add_evaluation_statistics_indexes',
    up: async (db: Database) => {
      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_evaluations_probability ON evaluations(probability);
        CREATE INDEX IF NOT EXISTS idx_evaluations_sex ON evaluations(sex);
      `);
    },
    down: async (db: Database) => {
      await db.exec(`
        DROP INDEX IF EXISTS idx_evaluations_probability;
        DROP INDEX IF EXISTS idx_evaluations_sex;
      `);
    }
  }
];

async function getCurrentVersion(db: Database): Promise<number> {
  const row = await db.get<{ version: number | null }>(
    'SELECT MAX(version) as version FROM migration_history'
  );
  return row?.version ?? 0;
}

type Direction = 'up' | 'down';

/**
 * Apply one migration step and its history bookkeeping atomically
 */
async function step(db: Database, migration: Migration, direction: Direction): Promise<void> {
  const label = `${migration.version} (${migration.name}) ${direction}`;
  console.log(`🔄 Migration ${label}`);

  await db.exec('BEGIN TRANSACTION;');
  try {
    if (direction === 'up') {
      await migration.up(db);
      await db.run(
        'INSERT INTO migration_history (version, name, applied_at) VALUES (?, ?, ?)',
        [migration.version, migration.name, new Date().toISOString()]
      );
    } else {
      await migration.down(db);
      await db.run('DELETE FROM migration_history WHERE version = ?', [migration.version]);
    }
    await db.exec('COMMIT;');
  } catch (error) {
    await db.exec('ROLLBACK;');
    console.error(`❌ Migration ${label} failed:`, error);
    throw error;
  }
}

/**
 * Bring the schema up to the newest version. Returns the versions applied.
 */
export async function runMigrations(db: Database): Promise<number[]> {
  // The history table has to exist before the current version can be read
  const history = migrations.find(m => m.name === MIGRATION_HISTORY);
  if (history) {
    await history.up(db);
  }

  const currentVersion = await getCurrentVersion(db);
  const pending = migrations.filter(m => m.version > currentVersion);

  for (const migration of pending) {
    await step(db, migration, 'up');
  }

  if (pending.length > 0) {
    console.log(`✅ Schema at version ${pending[pending.length - 1].version}`);
  }
  return pending.map(m => m.version);
}

/**
 * Undo migrations newer than `targetVersion`, newest first. The history table
 * itself is never dropped. Returns the versions rolled back.
 */
export async function rollbackMigration(db: Database, targetVersion: number): Promise<number[]> {
  const currentVersion = await getCurrentVersion(db);

  const undo = migrations
    .filter(m => m.version > targetVersion && m.version <= currentVersion && m.name !== MIGRATION_HISTORY)
    .sort((a, b) => b.version - a.version);

  for (const migration of undo) {
    await step(db, migration, 'down');
  }

  if (undo.length > 0) {
    console.log(`✅ Schema rolled back to version ${targetVersion}`);
  }
  return undo.map(m => m.version);
}

import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import { existsSync, mkdirSync } from 'fs';
import path from 'path';
import { runMigrations } from '../database/migrations';

let db: Database | null = null;

export const IN_MEMORY = ':memory:';

export function getDatabasePath(): string {
  return process.env.DATABASE_PATH || path.join(process.cwd(), 'data', 'evaluations.db');
}

/**
 * Initialize database connection and run migrations
 */
export async function initializeDatabase(): Promise<Database> {
  const database = await getDatabase();
  await runMigrations(database);

  console.log('✅ Database initialized');

  return database;
}

/**
 * Get or create database connection
 */
export async function getDatabase(): Promise<Database> {
  if (db) {
    return db;
  }

  const dbPath = getDatabasePath();

  if (dbPath !== IN_MEMORY) {
    const dir = path.dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  db = await open({
    filename: dbPath,
    driver: sqlite3.Database
  });

  // Wait instead of failing when another connection holds the write lock
  await db.exec('PRAGMA busy_timeout = 5000');

  return db;
}

/**
 * Cheap round trip used by health checks
 */
export async function pingDatabase(): Promise<boolean> {
  try {
    const database = await getDatabase();
    await database.get('SELECT 1');
    return true;
  } catch (error) {
    console.error('❌ Database ping failed:', error);
    return false;
  }
}

/**
 * Close database connection
 */
export async function closeDatabase(): Promise<void> {
  if (db) {
    await db.close();
    db = null;
  }
}

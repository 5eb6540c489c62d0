import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { SIM_CONFIG } from '@hustle/shared';

const __dirname = dirname(fileURLToPath(import.meta.url));

let db: Database.Database | null = null;

/** Open (or create) the database. Pass ':memory:' for a throwaway one. */
export function initDatabase(dbPath?: string): Database.Database {
  const path = dbPath || process.env.DB_PATH || join(__dirname, '..', '..', SIM_CONFIG.dbFilename);
  db = new Database(path);

  if (path !== ':memory:') {
    // Enable WAL mode for better concurrent read performance
    db.pragma('journal_mode = WAL');
  }

  const schema = readFileSync(join(__dirname, 'schema.sql'), 'utf-8');
  db.exec(schema);

  console.log(`[DB] Initialized at ${path}`);
  return db;
}

export function getDb(): Database.Database {
  if (!db) throw new Error('Database not initialized. Call initDatabase() first.');
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    console.log('[DB] Closed');
  }
}

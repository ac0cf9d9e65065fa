/**
 * Database - SQLite database initialization and schema management
 *
 * Holds device configurations only; measurements are never persisted.
 *
 * Storage location (in order of precedence):
 * 1. Provided directory parameter
 * 2. BENCHLOG_DATA_DIR environment variable
 * 3. XDG_DATA_HOME/benchlog (Linux/Pi)
 * 4. APPDATA/benchlog (Windows)
 * 5. ~/Library/Application Support/benchlog (macOS)
 * 6. ~/.local/share/benchlog (other platforms)
 */

import BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import os from 'os';

const CURRENT_SCHEMA_VERSION = 1;
const DATABASE_FILENAME = 'benchlog.db';
const APP_DIRECTORY = 'benchlog';

export interface Database {
  /** Get the underlying better-sqlite3 instance */
  readonly sqlite: BetterSqlite3.Database;

  /** List all table names in the database */
  listTables(): string[];

  /** Get the current schema version */
  getSchemaVersion(): number;

  getMeta(key: string): string | undefined;
  setMeta(key: string, value: string): void;

  close(): void;
}

/**
 * Determine the default data directory based on platform and environment
 */
function getDefaultDataDirectory(env: NodeJS.ProcessEnv = process.env): string {
  if (env.BENCHLOG_DATA_DIR) {
    return env.BENCHLOG_DATA_DIR;
  }

  if (env.XDG_DATA_HOME) {
    return path.join(env.XDG_DATA_HOME, APP_DIRECTORY);
  }

  const homedir = os.homedir();

  switch (os.platform()) {
    case 'win32':
      return path.join(env.APPDATA || path.join(homedir, 'AppData', 'Roaming'), APP_DIRECTORY);

    case 'darwin':
      return path.join(homedir, 'Library', 'Application Support', APP_DIRECTORY);

    case 'linux':
    default:
      return path.join(homedir, '.local', 'share', APP_DIRECTORY);
  }
}

/**
 * Create the database schema (version 1)
 */
function createSchemaV1(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    )
  `);

  // position keeps the registry's insertion order across restarts
  db.exec(`
    CREATE TABLE IF NOT EXISTS device_configs (
      name TEXT PRIMARY KEY,
      position INTEGER NOT NULL,
      address TEXT NOT NULL,
      function TEXT NOT NULL,
      range TEXT NOT NULL,
      sample_count INTEGER NOT NULL,
      user_label TEXT NOT NULL,
      enabled INTEGER NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);
}

/**
 * Run migrations to bring database to current schema version
 */
function runMigrations(db: BetterSqlite3.Database, currentVersion: number): void {
  if (currentVersion < 1) {
    createSchemaV1(db);
  }
}

function readSchemaVersion(sqlite: BetterSqlite3.Database): number {
  const metaTable = sqlite.prepare<[], { name: string }>(`
    SELECT name FROM sqlite_master
    WHERE type='table' AND name='meta'
  `).get();
  if (!metaTable) return 0;

  const row = sqlite.prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?').get('schema_version');
  return row ? parseInt(row.value, 10) : 0;
}

/**
 * Create a database connection and ensure schema is up to date
 *
 * @param dataDir - Directory for the database file. Defaults to the platform data directory.
 */
export function createDatabase(dataDir?: string): Database {
  const directory = dataDir || getDefaultDataDirectory();
  const dbPath = path.join(directory, DATABASE_FILENAME);

  mkdirSync(directory, { recursive: true });

  const sqlite = new BetterSqlite3(dbPath);
  sqlite.pragma('journal_mode = WAL');

  const currentVersion = readSchemaVersion(sqlite);
  if (currentVersion < CURRENT_SCHEMA_VERSION) {
    runMigrations(sqlite, currentVersion);

    sqlite.prepare(`
      INSERT OR REPLACE INTO meta (key, value) VALUES ('schema_version', ?)
    `).run(String(CURRENT_SCHEMA_VERSION));

    console.log(`[Database] Migrated from version ${currentVersion} to ${CURRENT_SCHEMA_VERSION}`);
  }

  const getMeta = sqlite.prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?');
  const setMeta = sqlite.prepare<[string, string]>('INSERT OR REPLACE INTO meta (key, value) VALUES (?, ?)');

  return {
    sqlite,

    listTables(): string[] {
      const rows = sqlite.prepare<[], { name: string }>(`
        SELECT name FROM sqlite_master
        WHERE type='table' AND name NOT LIKE 'sqlite_%'
        ORDER BY name
      `).all();
      return rows.map(r => r.name);
    },

    getSchemaVersion(): number {
      const row = getMeta.get('schema_version');
      return row ? parseInt(row.value, 10) : 0;
    },

    getMeta(key: string): string | undefined {
      return getMeta.get(key)?.value;
    },

    setMeta(key: string, value: string): void {
      setMeta.run(key, value);
    },

    close(): void {
      sqlite.close();
    },
  };
}

export { getDefaultDataDirectory };

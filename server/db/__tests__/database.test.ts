/**
 * Database module tests
 *
 * SQLite initialization, schema creation and the data directory lookup.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { createDatabase, getDefaultDataDirectory, type Database } from '../database.js';

describe('Database', () => {
  let testDir: string;
  let db: Database | undefined;

  beforeEach(async () => {
    testDir = path.join(os.tmpdir(), `benchlog-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(testDir, { recursive: true });
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    db?.close();
    db = undefined;
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('createDatabase', () => {
    it('should create the database file in the given directory', async () => {
      db = createDatabase(testDir);

      const stat = await fs.stat(path.join(testDir, 'benchlog.db'));
      expect(stat.isFile()).toBe(true);
    });

    it('should create the directory when missing', async () => {
      const nested = path.join(testDir, 'a', 'b');
      db = createDatabase(nested);

      const stat = await fs.stat(path.join(nested, 'benchlog.db'));
      expect(stat.isFile()).toBe(true);
    });

    it('should create the schema tables', () => {
      db = createDatabase(testDir);
      expect(db.listTables()).toEqual(['device_configs', 'meta']);
    });

    it('should record the schema version', () => {
      db = createDatabase(testDir);
      expect(db.getSchemaVersion()).toBe(1);
    });

    it('should migrate only once', () => {
      db = createDatabase(testDir);
      db.close();
      db = createDatabase(testDir);

      const migrations = vi.mocked(console.log).mock.calls.filter(call => String(call[0]).startsWith('[Database] Migrated'));
      expect(migrations).toHaveLength(1);
      expect(db.getSchemaVersion()).toBe(1);
    });

    it('should store meta values', () => {
      db = createDatabase(testDir);
      expect(db.getMeta('last_export')).toBeUndefined();

      db.setMeta('last_export', 'measurements_20240102_030405.csv');
      db.setMeta('last_export', 'measurements_20240103_030405.csv');

      expect(db.getMeta('last_export')).toBe('measurements_20240103_030405.csv');
    });

    it('should use WAL journal mode', () => {
      db = createDatabase(testDir);
      expect(db.sqlite.pragma('journal_mode', { simple: true })).toBe('wal');
    });
  });

  describe('getDefaultDataDirectory', () => {
    it('should prefer BENCHLOG_DATA_DIR', () => {
      expect(getDefaultDataDirectory({ BENCHLOG_DATA_DIR: '/srv/bench', XDG_DATA_HOME: '/xdg' })).toBe('/srv/bench');
    });

    it('should use XDG_DATA_HOME next', () => {
      expect(getDefaultDataDirectory({ XDG_DATA_HOME: '/xdg' })).toBe(path.join('/xdg', 'benchlog'));
    });

    it('should end in the app directory otherwise', () => {
      expect(path.basename(getDefaultDataDirectory({}))).toBe('benchlog');
    });
  });
});

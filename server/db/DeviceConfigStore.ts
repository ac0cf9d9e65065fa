/**
 * DeviceConfigStore - SQLite-backed storage for device configurations
 *
 * Stores what the user entered (name, address, function, range, sample count,
 * label, enabled). The resolved command is derived again when configs load.
 */

import type { DeviceConfig, DeviceConfigInput, Result } from '../../shared/types.js';
import { tryResult } from '../../shared/types.js';
import type { Database } from './database.js';

export interface DeviceConfigStore {
  /** Saved configs in registry order */
  list(): Result<DeviceConfigInput[], Error>;

  /** Insert or update one config; new names go to the end */
  save(config: DeviceConfig): Result<void, Error>;

  delete(name: string): Result<boolean, Error>;
}

interface DeviceConfigRow {
  name: string;
  position: number;
  address: string;
  function: string;
  range: string;
  sample_count: number;
  user_label: string;
  enabled: number;
}

/**
 * Create a SQLite-backed device config store
 *
 * @param db - Database instance (must be initialized with schema)
 */
export function createDeviceConfigStore(db: Database): DeviceConfigStore {
  const sqlite = db.sqlite;

  const selectAll = sqlite.prepare<[], DeviceConfigRow>(`
    SELECT name, position, address, function, range, sample_count, user_label, enabled
    FROM device_configs
    ORDER BY position
  `);
  const nextPosition = sqlite.prepare<[], { next: number }>(
    'SELECT COALESCE(MAX(position), -1) + 1 AS next FROM device_configs'
  );
  const upsert = sqlite.prepare<[string, number, string, string, string, number, string, number, number, number]>(`
    INSERT INTO device_configs
      (name, position, address, function, range, sample_count, user_label, enabled, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(name) DO UPDATE SET
      address = excluded.address,
      function = excluded.function,
      range = excluded.range,
      sample_count = excluded.sample_count,
      user_label = excluded.user_label,
      enabled = excluded.enabled,
      updated_at = excluded.updated_at
  `);
  const deleteOne = sqlite.prepare<[string]>('DELETE FROM device_configs WHERE name = ?');

  return {
    list(): Result<DeviceConfigInput[], Error> {
      return tryResult(() =>
        selectAll.all().map(row => ({
          name: row.name,
          address: row.address,
          function: row.function,
          range: row.range,
          sampleCount: row.sample_count,
          userLabel: row.user_label,
          enabled: row.enabled !== 0,
        }))
      );
    },

    save(config: DeviceConfig): Result<void, Error> {
      return tryResult(() => {
        const now = Date.now();
        const position = nextPosition.get()?.next ?? 0;
        upsert.run(
          config.name,
          position,
          config.address,
          config.function,
          config.range,
          config.sampleCount,
          config.userLabel,
          config.enabled ? 1 : 0,
          now,
          now,
        );
      });
    },

    delete(name: string): Result<boolean, Error> {
      return tryResult(() => deleteOne.run(name).changes > 0);
    },
  };
}

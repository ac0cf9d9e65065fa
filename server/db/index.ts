/**
 * Database module - SQLite persistence of device configurations
 */

export { createDatabase, getDefaultDataDirectory, type Database } from './database.js';
export { createDeviceConfigStore, type DeviceConfigStore } from './DeviceConfigStore.js';

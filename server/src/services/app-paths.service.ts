/**
 * Application Paths Service
 *
 * Manages the ~/.bindery/ application data directory structure.
 * The database and config file live here unless overridden.
 */

import { existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';

// Application data root directory
const APP_DIR_NAME = '.bindery';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Get the application data directory path
 * Default: ~/.bindery/ (BINDERY_DATA_DIR overrides)
 */
export function getAppDataDir(): string {
  const override = process.env.BINDERY_DATA_DIR;
  if (override && override.trim().length > 0) {
    return resolve(override.trim());
  }
  return join(homedir(), APP_DIR_NAME);
}

/**
 * Get the default path to the SQLite database
 */
export function getDatabasePath(): string {
  return join(getAppDataDir(), 'bindery.db');
}

/**
 * Get the path to the config file
 */
export function getConfigPath(): string {
  return join(getAppDataDir(), 'config.json');
}

/**
 * Get the path to the catalog schema.
 * Resolves the same from src/services and dist/services.
 */
export function getSchemaPath(): string {
  return resolve(__dirname, '..', '..', 'sql', 'schema.sql');
}

/**
 * Ensure the application data directory exists
 */
export function ensureAppDirectories(): void {
  const dir = getAppDataDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Centralized Path Definitions
 *
 * Single source of truth for ragrail's on-disk locations.
 *
 * Directory structure:
 * ~/.ragrail/            (or $RAGRAIL_HOME)
 * ├── ragrail.db         (SQLite index)
 * └── config.toml        (User configuration)
 *
 * Resolved on every call so RAGRAIL_HOME can be changed by tests.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the ragrail home directory
 */
export function getRagrailDir(): string {
  const override = process.env.RAGRAIL_HOME?.trim();
  return override ? override : join(homedir(), '.ragrail');
}

/**
 * Get the database file path
 */
export function getDbPath(): string {
  return join(getRagrailDir(), 'ragrail.db');
}

/**
 * Get the config file path
 */
export function getConfigPath(): string {
  return join(getRagrailDir(), 'config.toml');
}

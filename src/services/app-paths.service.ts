/**
 * Application Paths Service
 *
 * Manages the ~/.tomekeeper/ application data directory structure.
 * Config, the entity document and the cover cache live here.
 */

import { existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';

// Application data root directory
const APP_DIR_NAME = '.tomekeeper';

/**
 * Get the application data directory path
 * Default: ~/.tomekeeper/ (override with TOMEKEEPER_HOME)
 */
export function getAppDataDir(): string {
  const override = process.env.TOMEKEEPER_HOME;
  if (override && override.trim().length > 0) {
    return override.trim();
  }
  return join(homedir(), APP_DIR_NAME);
}

/**
 * Get the path to the config file
 */
export function getConfigPath(): string {
  return join(getAppDataDir(), 'config.json');
}

/**
 * Get the path to the persisted entity document
 */
export function getEntitiesDocumentPath(): string {
  return join(getAppDataDir(), 'entities.json');
}

/**
 * Get the path to the cache directory
 */
export function getCacheDir(): string {
  return join(getAppDataDir(), 'cache');
}

/**
 * Get the path to the extracted covers directory
 */
export function getCoversDir(): string {
  return join(getCacheDir(), 'covers');
}

/**
 * Ensure all application directories exist
 */
export function ensureAppDirectories(): void {
  const dirs = [getAppDataDir(), getCacheDir(), getCoversDir()];

  for (const dir of dirs) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
}

/**
 * Get all paths (for debugging/display)
 */
export function getAllPaths(): Record<string, string> {
  return {
    appData: getAppDataDir(),
    config: getConfigPath(),
    entities: getEntitiesDocumentPath(),
    cache: getCacheDir(),
    covers: getCoversDir(),
  };
}

import { join } from 'node:path';
import { APP_CONFIG_DIR, ENV_CONFIG_OVERRIDE, SETTINGS_FILENAME } from '../config/branding.js';

/**
 * Returns the root config directory (e.g. ~/.repofleet).
 * Respects the REPOFLEET_HOME env var override.
 */
export function getConfigRoot(env: NodeJS.ProcessEnv = process.env): string {
  return env[ENV_CONFIG_OVERRIDE] ?? APP_CONFIG_DIR;
}

/** Path to the user settings file. */
export function getSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getConfigRoot(env), SETTINGS_FILENAME);
}

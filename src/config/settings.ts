import { readFileSync, existsSync } from 'node:fs';
import yaml from 'js-yaml';
import { SettingsSchema, type Settings } from './schema.js';
import { getSettingsPath } from '../utils/home.js';
import { FleetError, formatIssues } from '../core/errors.js';

export interface LoadedSettings {
  settings: Settings;
  path: string;
  /** False when no settings file exists and every value is a default. */
  fromFile: boolean;
}

/**
 * Load user settings (~/.repofleet/config.yaml, or $REPOFLEET_HOME/config.yaml).
 * A missing file yields all defaults; an invalid one is a validation error.
 */
export function loadSettings(filePath: string = getSettingsPath()): LoadedSettings {
  if (!existsSync(filePath)) {
    return { settings: SettingsSchema.parse({}), path: filePath, fromFile: false };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FleetError('validation', `invalid YAML in ${filePath}: ${reason}`, { operation: 'load-settings' }, err);
  }

  // an empty file loads as undefined
  const result = SettingsSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new FleetError('validation', `invalid settings in ${filePath}: ${formatIssues(result.error)}`, { operation: 'load-settings' });
  }
  return { settings: result.data, path: filePath, fromFile: true };
}

export function dumpSettings(settings: Settings): string {
  return yaml.dump(settings, { indent: 2, lineWidth: 100, noRefs: true });
}

import { join } from 'node:path';
import { homedir } from 'node:os';

// ─── Root Brand Primitives ──────────────────────────────────────────

/** This tool's name (CLI command, config dir, manifest filename). */
export const APP_NAME = 'repofleet';

// ─── Derived Brand Constants ────────────────────────────────────────

/** Directory under $HOME (and under a sync target) for config and state: .repofleet */
export const CONFIG_DIR_NAME = `.${APP_NAME}`;

/** Environment variable for overriding the config root. */
export const ENV_CONFIG_OVERRIDE = `${APP_NAME.toUpperCase()}_HOME`;

/** Org manifest written into every sync target: repofleet.yaml */
export const MANIFEST_FILENAME = `${APP_NAME}.yaml`;

/** User settings file inside the config root. */
export const SETTINGS_FILENAME = 'config.yaml';

/** Session state directory, relative to a sync target. */
export const STATE_DIR = join(CONFIG_DIR_NAME, 'state');

/** Default config root: ~/.repofleet */
export const APP_CONFIG_DIR = join(homedir(), CONFIG_DIR_NAME);

/** Human-readable config dir path for messages. */
export const APP_CONFIG_DIR_DISPLAY = `~/${CONFIG_DIR_NAME}`;

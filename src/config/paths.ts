/**
 * Centralized Path Definitions
 *
 * Single source of truth for textvec's own files.
 *
 * Directory structure:
 * ~/.textvec/          ($TEXTVEC_HOME overrides)
 * └── config.toml     (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

import { getEnv } from './env.js';

export const CONFIG_FILENAME = 'config.toml';

/**
 * Get the textvec directory path
 * @returns $TEXTVEC_HOME when set, otherwise ~/.textvec
 */
export function getConfigDir(): string {
  const home = getEnv('TEXTVEC_HOME');
  return home ? home : join(homedir(), '.textvec');
}

/**
 * Get the config file path
 * @returns Absolute path to the TOML config file
 */
export function getConfigPath(): string {
  return join(getConfigDir(), CONFIG_FILENAME);
}

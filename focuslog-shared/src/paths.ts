/**
 * Config path resolution.
 */

import * as path from 'path';
import * as os from 'os';

export const CONFIG_FILE_NAME = 'config.json';

/**
 * Gets the focuslog config directory.
 * ~/.config/focuslog on Unix, %APPDATA%/focuslog on Windows.
 */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || os.homedir(), 'focuslog');
  }
  return path.join(os.homedir(), '.config', 'focuslog');
}

/**
 * Gets the path of the config file to load: an explicit path wins, then
 * FOCUSLOG_CONFIG, then the default file in the config directory.
 */
export function getConfigPath(explicitPath?: string): { path: string; explicit: boolean } {
  if (explicitPath) return { path: path.resolve(explicitPath), explicit: true };
  const fromEnv = process.env.FOCUSLOG_CONFIG;
  if (fromEnv) return { path: path.resolve(fromEnv), explicit: true };
  return { path: path.join(getConfigDir(), CONFIG_FILE_NAME), explicit: false };
}

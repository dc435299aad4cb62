/**
 * Shared path resolution helpers for clipcycle
 */

import * as os from 'os';
import * as path from 'path';

export const APP_DIR_NAME = 'clipcycle';

export interface ConfigDirEnv {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  homedir?: string;
}

/**
 * Per-user configuration directory.
 *
 * `CLIPCYCLE_CONFIG_DIR` wins; otherwise `%APPDATA%` on Windows, then
 * `$XDG_CONFIG_HOME`, then `~/.config`.
 */
export function resolveConfigDir(opts: ConfigDirEnv = {}): string {
  const env = opts.env ?? process.env;
  const platform = opts.platform ?? process.platform;
  const home = opts.homedir ?? os.homedir();

  const override = env.CLIPCYCLE_CONFIG_DIR?.trim();
  if (override) return path.resolve(override);

  if (platform === 'win32' && env.APPDATA) {
    return path.join(env.APPDATA, APP_DIR_NAME);
  }

  const xdg = env.XDG_CONFIG_HOME?.trim();
  if (xdg) return path.join(xdg, APP_DIR_NAME);

  return path.join(home, '.config', APP_DIR_NAME);
}

/**
 * Home-directory expansion and platform defaults
 */

import * as os from 'os';
import * as path from 'path';

/**
 * Expand a leading `~` or `~/` to the invoking user's home directory
 */
export function expandHome(filename: string, home = os.homedir()): string {
  if (filename === '~') {
    return home;
  }
  if (filename.startsWith('~/')) {
    return path.join(home, filename.slice(2));
  }
  return filename;
}

/**
 * Where Obsidian keeps its vault registry on this platform
 */
export function defaultRegistryPath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home = os.homedir()
): string {
  switch (platform) {
    case 'darwin':
      return path.join(home, 'Library', 'Application Support', 'obsidian', 'obsidian.json');
    case 'win32':
      return path.join(env.APPDATA || path.join(home, 'AppData', 'Roaming'), 'obsidian', 'obsidian.json');
    default:
      return path.join(env.XDG_CONFIG_HOME || path.join(home, '.config'), 'obsidian', 'obsidian.json');
  }
}

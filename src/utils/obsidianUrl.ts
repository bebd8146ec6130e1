/**
 * Obsidian URL and title helpers
 */

import * as path from 'path';

const MARKDOWN_EXTENSION = '.md';

/**
 * Build an obsidian://open URL for a vault-relative file
 */
export function asObsidianUrl(filePath: string, vault: string): string {
  return `obsidian://open?vault=${encodeURIComponent(vault)}&file=${encodeURIComponent(filePath)}`;
}

export function withoutMd(filename: string): string {
  return filename.endsWith(MARKDOWN_EXTENSION) ? filename.slice(0, -MARKDOWN_EXTENSION.length) : filename;
}

/**
 * Result title: base file name, `.md` dropped
 */
export function titleFor(filePath: string): string {
  return withoutMd(path.basename(filePath));
}

/**
 * fd prints `./`-prefixed paths in some modes; Obsidian wants them vault-relative
 */
export function normalizeVaultPath(filePath: string): string {
  return filePath.startsWith('./') ? filePath.slice(2) : filePath;
}

/**
 * Shape raw search output into Alfred result items
 */

import type { FruncateOptions, ResultItem, RipgrepMatch } from '../types/index.js';
import { fruncate } from './fruncate.js';
import { asObsidianUrl, normalizeVaultPath, titleFor } from './obsidianUrl.js';

export function toResultItem(filePath: string, vault: string, subtitle = ''): ResultItem {
  const relativePath = normalizeVaultPath(filePath);
  return {
    type: 'default',
    title: titleFor(relativePath),
    subtitle,
    arg: asObsidianUrl(relativePath, vault),
  };
}

/**
 * One item per file path, in the order the file finder printed them
 */
export function filenameResults(paths: string[], vault: string): ResultItem[] {
  return paths.filter(p => p.length > 0).map(p => toResultItem(p, vault));
}

/**
 * One item per distinct file, keeping the first matching line of each
 */
export function contentResults(
  matches: RipgrepMatch[],
  term: string,
  vault: string,
  options: FruncateOptions
): ResultItem[] {
  const alreadyFound = new Set<string>();
  const results: ResultItem[] = [];

  for (const match of matches) {
    if (alreadyFound.has(match.path)) {
      continue;
    }
    alreadyFound.add(match.path);
    results.push(toResultItem(match.path, vault, fruncate(match.lineText, term, options)));
  }

  return results;
}

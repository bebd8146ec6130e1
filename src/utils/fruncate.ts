/**
 * Front truncation of a matched line for the result subtitle
 */

import type { FruncateOptions } from '../types/index.js';

export const DEFAULT_FRUNCATE_OPTIONS: FruncateOptions = {
  leadContext: 10,
  breakWindow: 5,
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Index of the first occurrence of `term` in `line`, or -1
 */
export function indexOfTerm(line: string, term: string, ignoreCase = false): number {
  if (!ignoreCase) {
    return line.indexOf(term);
  }
  // A case-insensitive regex keeps indices aligned with `line`, unlike lowercasing both
  return line.search(new RegExp(escapeRegExp(term), 'i'));
}

/**
 * Drop the start of `line` so that roughly `leadContext` characters remain
 * before `term`, preferring to start on a word boundary no more than
 * `breakWindow` characters earlier. Lines where the term is near the start
 * (or absent) come back unchanged.
 */
export function fruncate(line: string, term: string, options: FruncateOptions = DEFAULT_FRUNCATE_OPTIONS): string {
  const index = indexOfTerm(line, term, options.ignoreCase);
  if (index <= options.leadContext) {
    return line;
  }

  const cut = index - options.leadContext;
  const breakIndex = line.slice(0, cut).lastIndexOf(' ');
  if (breakIndex > 0 && breakIndex >= cut - options.breakWindow) {
    return line.slice(breakIndex + 1);
  }
  return line.slice(cut);
}

/**
 * Search request and result types
 */

export type SearchMode = 'filename' | 'content';

export interface SearchRequest {
  readonly term: string;
  readonly directory: string; // Vault root, already home-expanded
  readonly vaultIdentifier: string;
  readonly mode: SearchMode;
}

/**
 * One decoded `type: "match"` record from `rg --json`
 */
export interface RipgrepMatch {
  path: string;
  lineText: string; // Trailing newline removed
}

/**
 * Alfred Script Filter item
 */
export interface ResultItem {
  type: 'default';
  title: string;
  subtitle: string;
  arg: string; // obsidian://open URL
}

export interface ResultSet {
  items: ResultItem[];
}

export interface FruncateOptions {
  /** Characters of context kept before the match */
  leadContext: number;
  /** How far before the cut a space may sit and still be used as the break */
  breakWindow: number;
  /** Locate the term ignoring case */
  ignoreCase?: boolean;
}

/**
 * Alfred Script Filter serialization
 */

import type { ResultItem, ResultSet } from '../types/index.js';

export function toResultSet(items: ResultItem[]): ResultSet {
  return { items };
}

/**
 * Turn `\u0026` escapes back into `&`. Alfred passes arg through verbatim,
 * so the query separator must stay a literal `&`. An escaped backslash
 * followed by "u0026" is left alone.
 */
export function unescapeAmpersands(json: string): string {
  return json.replace(/(?<=(?:^|[^\\])(?:\\\\)*)\\u0026/g, '&');
}

/**
 * Indented JSON document with a trailing newline. Field order is fixed so
 * the output does not depend on how an item was built.
 */
export function serializeResults(results: ResultSet): string {
  const items = results.items.map(item => ({
    type: item.type,
    title: item.title,
    subtitle: item.subtitle,
    arg: item.arg,
  }));

  return unescapeAmpersands(JSON.stringify({ items }, null, 2)) + '\n';
}

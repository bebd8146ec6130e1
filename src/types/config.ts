/**
 * Configuration types for vault-search
 */

import { ConfigError } from '../utils/errors.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';
import { defaultRegistryPath, expandHome } from '../utils/paths.js';

export interface Config {
  /** File finder executable (default: fd on PATH) */
  fdPath: string;
  /** Content search executable (default: rg on PATH) */
  rgPath: string;
  /** Obsidian's obsidian.json (default: per-platform location) */
  registryPath: string;
  /** Fall back to the open vault in the registry (default: true) */
  useRegistry: boolean;
  /** Pass --ignore-case to rg (default: true) */
  ignoreCase: boolean;
  /** Characters kept before a content match in the subtitle (default: 10) */
  leadContext: number;
  /** Window before the cut searched for a word break (default: 5) */
  breakWindow: number;
  /** Locate the term ignoring case when truncating subtitles (default: false) */
  truncateIgnoreCase: boolean;
  logLevel: LogLevel;
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigError(`${name} must be true or false, got "${value}"`);
  }
}

function parseCount(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const logLevel = env.LOG_LEVEL || 'warn';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error; got "${logLevel}"`);
  }

  return {
    fdPath: expandHome(env.VAULT_SEARCH_FD_PATH || 'fd'),
    rgPath: expandHome(env.VAULT_SEARCH_RG_PATH || 'rg'),
    registryPath: env.VAULT_SEARCH_REGISTRY ? expandHome(env.VAULT_SEARCH_REGISTRY) : defaultRegistryPath(process.platform, env),
    useRegistry: parseBoolean('VAULT_SEARCH_USE_REGISTRY', env.VAULT_SEARCH_USE_REGISTRY, true),
    ignoreCase: parseBoolean('VAULT_SEARCH_IGNORE_CASE', env.VAULT_SEARCH_IGNORE_CASE, true),
    leadContext: parseCount('VAULT_SEARCH_LEAD_CONTEXT', env.VAULT_SEARCH_LEAD_CONTEXT, 10),
    breakWindow: parseCount('VAULT_SEARCH_BREAK_WINDOW', env.VAULT_SEARCH_BREAK_WINDOW, 5),
    truncateIgnoreCase: parseBoolean(
      'VAULT_SEARCH_TRUNCATE_IGNORE_CASE',
      env.VAULT_SEARCH_TRUNCATE_IGNORE_CASE,
      false
    ),
    logLevel,
  };
}

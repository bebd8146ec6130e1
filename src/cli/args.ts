/**
 * Command-line parsing
 */

import { parseArgs } from 'util';
import type { SearchMode } from '../types/index.js';
import { USAGE, UsageError } from '../utils/errors.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';

export interface CliArgs {
  term: string;
  mode: SearchMode;
  vault?: string;
  path?: string;
  caseSensitive: boolean;
  logLevel?: LogLevel;
  help: boolean;
}

const options = {
  grep: { type: 'boolean', short: 'g', default: false },
  vault: { type: 'string', short: 'v' },
  path: { type: 'string', short: 'p' },
  'case-sensitive': { type: 'boolean', default: false },
  'log-level': { type: 'string' },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

function parseArgv(argv: string[]) {
  try {
    return parseArgs({ args: argv, options, allowPositionals: true, strict: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new UsageError(`${message}\n${USAGE}`, { cause: error });
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgv(argv);
  const logLevel = values['log-level'];
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new UsageError(`--log-level must be one of debug, info, warn, error; got "${logLevel}"`);
  }

  const term = positionals.join(' ');
  if (!term && !values.help) {
    throw new UsageError(USAGE);
  }

  return {
    term,
    mode: values.grep ? 'content' : 'filename',
    vault: values.vault,
    path: values.path,
    caseSensitive: values['case-sensitive'],
    logLevel,
    help: values.help,
  };
}

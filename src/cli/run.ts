/**
 * One invocation: arguments in, Alfred JSON out
 */

import { loadConfig, type Config } from '../types/index.js';
import { FdService } from '../services/fdService.js';
import { RipgrepService } from '../services/ripgrepService.js';
import { SearchService } from '../services/searchService.js';
import { resolveSearchRequest } from '../services/vaultService.js';
import { serializeResults } from '../utils/alfred.js';
import { USAGE } from '../utils/errors.js';
import { setLogLevel } from '../utils/logger.js';
import { parseCliArgs } from './args.js';

export interface RunContext {
  env: NodeJS.ProcessEnv;
  /** Receives the whole result document, once, after the search succeeded */
  write: (output: string) => void;
}

export function createSearchService(config: Config): SearchService {
  return new SearchService(config, new FdService(config.fdPath), new RipgrepService(config.rgPath));
}

export async function run(argv: string[], context: RunContext): Promise<void> {
  const args = parseCliArgs(argv);
  if (args.help) {
    context.write(`${USAGE}\n`);
    return;
  }

  const loaded = loadConfig(context.env);
  const config: Config = args.caseSensitive ? { ...loaded, ignoreCase: false } : loaded;
  setLogLevel(args.logLevel ?? config.logLevel);

  const request = await resolveSearchRequest(args, config);
  const results = await createSearchService(config).search(request);

  context.write(serializeResults(results));
}

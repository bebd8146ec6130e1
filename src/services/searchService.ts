/**
 * Search service - runs the search for one request and shapes the results
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import type { Config, ResultItem, ResultSet, SearchRequest } from '../types/index.js';
import { toResultSet } from '../utils/alfred.js';
import { DirectoryError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { contentResults, filenameResults } from '../utils/results.js';
import type { FdService } from './fdService.js';
import type { RipgrepService } from './ripgrepService.js';

/**
 * Fail unless `directory` exists and is a directory
 */
export async function assertDirectory(directory: string): Promise<void> {
  let stat: Stats;
  try {
    stat = await fs.stat(directory);
  } catch (error) {
    throw new DirectoryError(directory, { cause: error });
  }
  if (!stat.isDirectory()) {
    throw new DirectoryError(directory);
  }
}

export class SearchService {
  private config: Config;
  private fdService: FdService;
  private ripgrepService: RipgrepService;

  constructor(config: Config, fdService: FdService, ripgrepService: RipgrepService) {
    this.config = config;
    this.fdService = fdService;
    this.ripgrepService = ripgrepService;
  }

  async search(request: SearchRequest): Promise<ResultSet> {
    await assertDirectory(request.directory);

    const items = request.mode === 'content'
      ? await this.grepMatchingFiles(request)
      : await this.findMatchingFiles(request);

    logger.info('SearchService', `${items.length} ${request.mode} results for "${request.term}"`);
    return toResultSet(items);
  }

  private async findMatchingFiles(request: SearchRequest): Promise<ResultItem[]> {
    const paths = await this.fdService.findFiles(request.term, request.directory);
    return filenameResults(paths, request.vaultIdentifier);
  }

  private async grepMatchingFiles(request: SearchRequest): Promise<ResultItem[]> {
    const matches = await this.ripgrepService.search(request.term, request.directory, {
      ignoreCase: this.config.ignoreCase,
    });
    return contentResults(matches, request.term, request.vaultIdentifier, {
      leadContext: this.config.leadContext,
      breakWindow: this.config.breakWindow,
      ignoreCase: this.config.truncateIgnoreCase,
    });
  }
}

/**
 * Vault resolution: explicit options first, then Obsidian's registry
 */

import * as fs from 'fs/promises';
import {
  vaultRegistrySchema,
  type Config,
  type ResolvedVault,
  type SearchMode,
  type SearchRequest,
  type VaultRegistry,
} from '../types/index.js';
import { AmbiguousConfigError, ConfigError, UsageError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { expandHome } from '../utils/paths.js';

export interface SearchInput {
  term: string;
  vault?: string;
  path?: string;
  mode: SearchMode;
}

/**
 * Load and validate obsidian.json
 */
export async function readVaultRegistry(registryPath: string): Promise<VaultRegistry> {
  let content: string;
  try {
    content = await fs.readFile(registryPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Could not open ${registryPath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Could not parse ${registryPath}: ${content}`, { cause: error });
  }

  const result = vaultRegistrySchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Unexpected vault registry format in ${registryPath}`, { cause: result.error });
  }
  return result.data;
}

/**
 * The vault Obsidian has open. More than one candidate is an error rather
 * than an arbitrary pick, since the registry's key order means nothing.
 */
export function findOpenVault(registry: VaultRegistry): ResolvedVault | undefined {
  const open = Object.entries(registry.vaults).filter(([, vault]) => vault.open === true);

  if (open.length > 1) {
    throw new AmbiguousConfigError(open.map(([id]) => id));
  }
  if (open.length === 0) {
    return undefined;
  }

  const [id, vault] = open[0];
  return { id, path: vault.path };
}

/**
 * Fill in vault name and path and build the immutable request
 */
export async function resolveSearchRequest(input: SearchInput, config: Config): Promise<SearchRequest> {
  let vaultName = input.vault ?? '';
  let vaultPath = input.path ?? '';

  if (!vaultName || !vaultPath) {
    if (!config.useRegistry) {
      const missing = !vaultName ? '--vault' : '--path';
      throw new UsageError(`Missing ${missing}`);
    }

    const registry = await readVaultRegistry(config.registryPath);
    const open = findOpenVault(registry);
    logger.debug('VaultService', `Open vault in ${config.registryPath}`, open);

    if (!vaultName) vaultName = open?.id ?? '';
    if (!vaultPath) vaultPath = open?.path ?? '';
  }

  if (!vaultName) {
    throw new ConfigError(`No vault name: pass --vault or open a vault in Obsidian (${config.registryPath})`);
  }
  if (!vaultPath) {
    throw new ConfigError(`No vault path: pass --path or open a vault in Obsidian (${config.registryPath})`);
  }

  const request: SearchRequest = Object.freeze({
    term: input.term,
    directory: expandHome(vaultPath),
    vaultIdentifier: vaultName,
    mode: input.mode,
  });
  logger.debug('VaultService', 'Resolved search request', request);
  return request;
}

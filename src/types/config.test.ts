import { describe, it, expect } from 'vitest';
import { ConfigError } from '../utils/errors.js';
import { defaultRegistryPath } from '../utils/paths.js';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      fdPath: 'fd',
      rgPath: 'rg',
      registryPath: defaultRegistryPath(process.platform, {}),
      useRegistry: true,
      ignoreCase: true,
      leadContext: 10,
      breakWindow: 5,
      truncateIgnoreCase: false,
      logLevel: 'warn',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      VAULT_SEARCH_FD_PATH: '/opt/bin/fd',
      VAULT_SEARCH_RG_PATH: '/opt/bin/rg',
      VAULT_SEARCH_REGISTRY: '/tmp/obsidian.json',
      VAULT_SEARCH_USE_REGISTRY: 'false',
      VAULT_SEARCH_IGNORE_CASE: 'no',
      VAULT_SEARCH_LEAD_CONTEXT: '20',
      VAULT_SEARCH_BREAK_WINDOW: '0',
      VAULT_SEARCH_TRUNCATE_IGNORE_CASE: 'true',
      LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      fdPath: '/opt/bin/fd',
      rgPath: '/opt/bin/rg',
      registryPath: '/tmp/obsidian.json',
      useRegistry: false,
      ignoreCase: false,
      leadContext: 20,
      breakWindow: 0,
      truncateIgnoreCase: true,
      logLevel: 'debug',
    });
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ VAULT_SEARCH_LEAD_CONTEXT: '', VAULT_SEARCH_IGNORE_CASE: '' })).toMatchObject({
      leadContext: 10,
      ignoreCase: true,
    });
  });

  it.each([
    [{ VAULT_SEARCH_LEAD_CONTEXT: 'ten' }, 'VAULT_SEARCH_LEAD_CONTEXT must be a non-negative integer, got "ten"'],
    [{ VAULT_SEARCH_BREAK_WINDOW: '-1' }, 'VAULT_SEARCH_BREAK_WINDOW must be a non-negative integer, got "-1"'],
    [{ VAULT_SEARCH_LEAD_CONTEXT: '1.5' }, 'VAULT_SEARCH_LEAD_CONTEXT must be a non-negative integer, got "1.5"'],
    [{ VAULT_SEARCH_USE_REGISTRY: 'maybe' }, 'VAULT_SEARCH_USE_REGISTRY must be true or false, got "maybe"'],
    [{ LOG_LEVEL: 'verbose' }, 'LOG_LEVEL must be one of debug, info, warn, error; got "verbose"'],
  ])('rejects %o', (env, message) => {
    expect(() => loadConfig(env)).toThrow(ConfigError);
    expect(() => loadConfig(env)).toThrow(message);
  });
});

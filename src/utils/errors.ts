/**
 * Error taxonomy. Nothing below the entry point recovers from these;
 * src/index.ts logs the message and exits with `exitCode`.
 */

export abstract class VaultSearchError extends Error {
  abstract readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export const USAGE = 'Usage: vault-search [--grep] [--vault <id>] [--path <dir>] [--case-sensitive] [--log-level <level>] <term...>';

/** Missing or malformed command-line input */
export class UsageError extends VaultSearchError {
  readonly exitCode = 2;
}

/** Vault registry or environment could not supply a usable value */
export class ConfigError extends VaultSearchError {
  readonly exitCode = 1;
}

/** More than one vault in the registry is marked open */
export class AmbiguousConfigError extends ConfigError {
  constructor(readonly candidates: string[]) {
    super(`More than one open vault in registry (${candidates.join(', ')}); pass --vault and --path`);
  }
}

export class DirectoryError extends VaultSearchError {
  readonly exitCode = 1;

  constructor(readonly directory: string, options?: { cause?: unknown }) {
    super(`No such directory ${directory}`, options);
  }
}

/** External command failed to start or exited unsuccessfully */
export class ExecutionError extends VaultSearchError {
  readonly exitCode = 1;
}

/** Output of an external command could not be decoded */
export class ParseError extends VaultSearchError {
  readonly exitCode = 1;
}

/**
 * Ripgrep service for vault content search
 */

import { spawn } from 'child_process';
import { z } from 'zod';
import type { RipgrepMatch } from '../types/index.js';
import { ParseError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface RipgrepOptions {
  /** Case insensitive search */
  ignoreCase?: boolean;
}

// rg reports non-UTF-8 paths and lines as base64 `bytes` instead of `text`
const textOrBytesSchema = z.union([
  z.object({ text: z.string() }),
  z.object({ bytes: z.string() }),
]);

const ripgrepMessageSchema = z.object({
  type: z.string(),
  data: z.unknown(),
});

const ripgrepMatchDataSchema = z.object({
  path: textOrBytesSchema,
  lines: textOrBytesSchema,
});

function decodeText(value: z.infer<typeof textOrBytesSchema>): string {
  return 'text' in value ? value.text : Buffer.from(value.bytes, 'base64').toString('utf-8');
}

/**
 * Decode `rg --json` output. Messages other than `match` are skipped; any
 * line that is not valid JSON or not a well-formed message is fatal.
 */
export function parseRipgrepOutput(output: string): RipgrepMatch[] {
  const matches: RipgrepMatch[] = [];

  for (const line of output.split('\n')) {
    if (!line.startsWith('{')) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      throw new ParseError(`Could not parse ${line}`, { cause: error });
    }

    const message = ripgrepMessageSchema.safeParse(parsed);
    if (!message.success) {
      throw new ParseError(`Could not parse ${line}`, { cause: message.error });
    }
    if (message.data.type !== 'match') continue;

    const data = ripgrepMatchDataSchema.safeParse(message.data.data);
    if (!data.success) {
      throw new ParseError(`Malformed match record ${line}`, { cause: data.error });
    }

    matches.push({
      path: decodeText(data.data.path),
      lineText: decodeText(data.data.lines).replace(/\r?\n$/, ''),
    });
  }

  return matches;
}

export class RipgrepService {
  private rgPath: string;

  constructor(rgPath = 'rg') {
    this.rgPath = rgPath;
  }

  /**
   * Search file contents under `cwd`, most recently modified files first
   */
  async search(term: string, cwd: string, options: RipgrepOptions = {}): Promise<RipgrepMatch[]> {
    const args = this.buildArgs(term, options);
    logger.debug('RipgrepService', `Running ${this.rgPath} ${args.join(' ')} in ${cwd}`);

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let stderr = '';
      let settled = false;

      const finish = () => {
        if (settled) return;
        settled = true;
        try {
          resolve(parseRipgrepOutput(Buffer.concat(chunks).toString('utf-8')));
        } catch (error) {
          reject(error);
        }
      };

      // With no path argument rg searches stdin whenever stdin is a pipe
      const proc = spawn(this.rgPath, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });

      proc.stdout.on('data', (data: Buffer) => {
        chunks.push(data);
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      // A failed rg run yields whatever it printed, usually nothing
      proc.on('error', error => {
        logger.warn('RipgrepService', 'Ripgrep process error', error);
        finish();
      });

      proc.on('close', code => {
        // ripgrep returns 1 when no matches found, which is not an error
        if (code !== 0 && code !== 1) {
          logger.warn('RipgrepService', `Ripgrep exited with code ${code}`, stderr);
        }
        finish();
      });
    });
  }

  /**
   * Build ripgrep arguments
   */
  buildArgs(term: string, options: RipgrepOptions): string[] {
    const args = ['--json'];

    if (options.ignoreCase) {
      args.push('--ignore-case');
    }

    args.push('--sortr', 'modified');
    args.push('--', term);

    return args;
  }
}

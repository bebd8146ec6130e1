/**
 * fd service for vault file name search
 */

import { spawn } from 'child_process';
import { ExecutionError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Split `fd -0` output into paths, dropping empty tokens
 */
export function parseFdOutput(output: Buffer): string[] {
  return output
    .toString('utf-8')
    .split('\0')
    .filter(token => token.length > 0);
}

export class FdService {
  private fdPath: string;

  constructor(fdPath = 'fd') {
    this.fdPath = fdPath;
  }

  /**
   * Find regular files under `cwd` whose names match the glob `pattern`
   */
  async findFiles(pattern: string, cwd: string): Promise<string[]> {
    const args = this.buildArgs(pattern);
    const command = `${this.fdPath} ${args.join(' ')}`;
    logger.debug('FdService', `Running ${command} in ${cwd}`);

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let stderr = '';
      let settled = false;

      const proc = spawn(this.fdPath, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });

      proc.stdout.on('data', (data: Buffer) => {
        chunks.push(data);
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', error => {
        if (settled) return;
        settled = true;
        reject(new ExecutionError(`Could not run ${command}: ${error.message}`, { cause: error }));
      });

      proc.on('close', (code, signal) => {
        if (settled) return;
        settled = true;
        if (code !== 0) {
          const status = signal ? `signal ${signal}` : `code ${code}`;
          const detail = stderr.trim() ? `: ${stderr.trim()}` : '';
          reject(new ExecutionError(`${command} exited with ${status}${detail}`));
          return;
        }
        resolve(parseFdOutput(Buffer.concat(chunks)));
      });
    });
  }

  buildArgs(pattern: string): string[] {
    return ['-0', '--type=f', '--glob', '--', pattern];
  }
}

/**
 * External tool runner
 */

import { execFile } from 'child_process';
import { ExternalToolError, isNodeError } from '../errors.js';

export interface ToolResult {
  /** null when the process was ended by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  /** 0 disables the limit */
  timeoutMs?: number;
  cwd?: string;
}

export type ToolRunner = (tool: string, args: string[], options?: RunOptions) => Promise<ToolResult>;

/**
 * Run a binary without a shell. A nonzero exit resolves with its status and
 * output; only a missing binary rejects.
 */
export const runTool: ToolRunner = (tool, args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      tool,
      args,
      { timeout: options.timeoutMs ?? 0, cwd: options.cwd, encoding: 'utf8', windowsHide: true },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }
        if (isNodeError(error, 'ENOENT')) {
          reject(new ExternalToolError(tool, tool, `${tool} was not found; is it installed and on PATH?`));
          return;
        }
        const exitCode = typeof error.code === 'number' ? error.code : null;
        resolve({
          exitCode,
          stdout,
          stderr,
          timedOut: error.killed === true,
        });
      }
    );
  });

/**
 * Git Service
 * Reads and rewrites a repository's remote URL. The URL itself is computed
 * by the remote service; git only stores it.
 */

import { simpleGit, SimpleGit, SimpleGitOptions } from 'simple-git';
import fs from 'fs-extra';
import path from 'path';
import { ExternalToolError, NotFoundError } from '../errors.js';

export interface GitRemoteClient {
  isRepository(repoPath: string): Promise<boolean>;
  getRemoteUrl(repoPath: string, remote: string): Promise<string>;
  setRemoteUrl(repoPath: string, remote: string, url: string): Promise<void>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SimpleGitRemoteClient implements GitRemoteClient {
  private getGit(repoPath: string): SimpleGit {
    const options: Partial<SimpleGitOptions> = {
      baseDir: path.resolve(repoPath),
      binary: 'git',
      maxConcurrentProcesses: 1,
      trimmed: true,
    };
    return simpleGit(options);
  }

  async isRepository(repoPath: string): Promise<boolean> {
    if (!(await fs.pathExists(repoPath))) {
      return false;
    }
    try {
      return await this.getGit(repoPath).checkIsRepo();
    } catch {
      return false;
    }
  }

  async getRemoteUrl(repoPath: string, remote: string): Promise<string> {
    if (!(await this.isRepository(repoPath))) {
      throw new NotFoundError(repoPath, `Not a git repository: ${path.resolve(repoPath)}`);
    }

    try {
      const url = await this.getGit(repoPath).remote(['get-url', remote]);
      if (typeof url !== 'string' || url.trim() === '') {
        throw new NotFoundError(remote, `Remote "${remote}" has no URL`);
      }
      return url.trim();
    } catch (error) {
      if (error instanceof NotFoundError) throw error;
      const message = errorMessage(error);
      if (message.includes('No such remote')) {
        throw new NotFoundError(remote, `Remote "${remote}" not found. Add one with: git remote add ${remote} <url>`);
      }
      throw new ExternalToolError('git', remote, 'git remote get-url failed', message);
    }
  }

  async setRemoteUrl(repoPath: string, remote: string, url: string): Promise<void> {
    try {
      await this.getGit(repoPath).remote(['set-url', remote, url]);
    } catch (error) {
      throw new ExternalToolError('git', remote, 'git remote set-url failed', errorMessage(error));
    }
  }
}

/**
 * Git access: cloning, the current commit and the files changed between two
 * commits.
 */

import * as fs from 'fs';
import * as path from 'path';
import { simpleGit, type SimpleGit } from 'simple-git';
import { PermanentError } from '../errors.js';

export type ChangeStatus = 'A' | 'M' | 'D' | 'R';

export interface ChangedFile {
  status: ChangeStatus;
  /** The new path for renames */
  path: string;
  /** Only set for renames */
  previousPath?: string;
}

export interface CloneOptions {
  branch?: string;
  token?: string;
}

export interface GitProvider {
  clone(url: string, dest: string, options?: CloneOptions): Promise<string>;
  getHeadCommit(repoPath: string): Promise<string>;
  getCurrentBranch(repoPath: string): Promise<string>;
  getChangedFiles(repoPath: string, baseSha: string, headSha?: string): Promise<ChangedFile[]>;
}

/**
 * Parse `git diff --name-status` output. Copies count as additions and type
 * changes as modifications; unknown status letters are dropped.
 */
export function parseNameStatus(output: string): ChangedFile[] {
  const changes: ChangedFile[] = [];

  for (const line of output.split('\n')) {
    if (!line.trim()) continue;
    const [status, ...paths] = line.split('\t');
    const code = status.charAt(0);

    if ((code === 'R' || code === 'C') && paths.length >= 2) {
      const [from, to] = paths;
      changes.push(code === 'R' ? { status: 'R', path: to, previousPath: from } : { status: 'A', path: to });
    } else if (paths.length >= 1 && (code === 'A' || code === 'M' || code === 'D' || code === 'T')) {
      changes.push({ status: code === 'T' ? 'M' : code, path: paths[0] });
    }
  }

  return changes;
}

/**
 * Every path a change touches: both sides of a rename.
 */
export function changedPaths(changes: ChangedFile[]): string[] {
  const paths = new Set<string>();
  for (const change of changes) {
    paths.add(change.path);
    if (change.previousPath) paths.add(change.previousPath);
  }
  return [...paths].sort();
}

/**
 * Embed an access token into an https clone URL.
 */
export function authenticatedUrl(url: string, token?: string): string {
  if (!token || !url.startsWith('https://')) {
    return url;
  }
  return url.replace('https://', `https://x-access-token:${encodeURIComponent(token)}@`);
}

export class SimpleGitProvider implements GitProvider {
  private git(repoPath?: string): SimpleGit {
    return repoPath ? simpleGit(repoPath) : simpleGit();
  }

  /**
   * Shallow-clone into `dest`, or pull when `dest` already holds a clone.
   */
  async clone(url: string, dest: string, options: CloneOptions = {}): Promise<string> {
    const target = path.resolve(dest);

    if (fs.existsSync(path.join(target, '.git'))) {
      await this.git(target).pull();
      return target;
    }

    fs.mkdirSync(path.dirname(target), { recursive: true });
    const args = ['--depth', '1'];
    if (options.branch) {
      args.push('--branch', options.branch);
    }
    await this.git().clone(authenticatedUrl(url, options.token), target, args);
    return target;
  }

  async getHeadCommit(repoPath: string): Promise<string> {
    const log = await this.git(repoPath).log({ maxCount: 1 });
    const hash = log.latest?.hash;
    if (!hash) {
      throw new PermanentError(`Repository has no commits: ${repoPath}`);
    }
    return hash;
  }

  async getCurrentBranch(repoPath: string): Promise<string> {
    const branch = (await this.git(repoPath).revparse(['--abbrev-ref', 'HEAD'])).trim();
    return branch && branch !== 'HEAD' ? branch : 'main';
  }

  async getChangedFiles(repoPath: string, baseSha: string, headSha = 'HEAD'): Promise<ChangedFile[]> {
    const output = await this.git(repoPath).diff(['--name-status', baseSha, headSha]);
    return parseNameStatus(output);
  }
}

/**
 * File tree scanning for one scope.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import picomatch from 'picomatch';
import { PermanentError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

export interface ScanPatterns {
  include: string[];
  exclude: string[];
}

export interface ScanLimits {
  maxFileSize: number;
  maxTotalFiles: number;
  maxRepoSize: number;
}

const IGNORED_DIRS = ['node_modules', '__pycache__', 'venv', '.venv'];

const README_CANDIDATES = ['README.md', 'README.rst', 'README.txt', 'README', 'readme.md', 'Readme.md'];

const GLOB_CHARS = /[*?[]/;

/**
 * A pattern without glob characters is a directory prefix: `src` (or
 * `src/`) matches `src/a.ts` but not `srclib/a.ts`. Other patterns are globs;
 * one without a slash is matched against the basename at any depth.
 */
export function matchesPattern(filePath: string, pattern: string): boolean {
  if (!GLOB_CHARS.test(pattern)) {
    const prefix = pattern.replace(/\/+$/, '');
    return filePath === prefix || filePath.startsWith(`${prefix}/`);
  }
  return picomatch.isMatch(filePath, pattern, { dot: true, basename: !pattern.includes('/') });
}

/**
 * Empty include means every file; excludes always subtract.
 */
export function applyPatterns(files: string[], patterns: ScanPatterns): string[] {
  const included =
    patterns.include.length > 0 ? files.filter((f) => patterns.include.some((p) => matchesPattern(f, p))) : [...files];
  return included.filter((f) => !patterns.exclude.some((p) => matchesPattern(f, p)));
}

/**
 * Relative paths (with `/` separators) of the documentable files under
 * `rootPath`, sorted.
 *
 * @throws PermanentError when the tree crosses the total size or file count limit
 */
export async function scanFiles(
  rootPath: string,
  patterns: ScanPatterns,
  limits: ScanLimits,
  logger: Logger = silentLogger
): Promise<string[]> {
  const candidates = await glob('**/*', {
    cwd: rootPath,
    nodir: true,
    dot: false,
    posix: true,
    ignore: IGNORED_DIRS.map((dir) => `**/${dir}/**`),
  });
  candidates.sort();

  const allFiles: string[] = [];
  let totalSize = 0;

  for (const relPath of candidates) {
    let size: number;
    try {
      size = (await fs.stat(path.join(rootPath, relPath))).size;
    } catch {
      continue;
    }

    if (size > limits.maxFileSize) {
      logger.warn(`Skipping oversized file: ${relPath} (${size} bytes)`);
      continue;
    }

    totalSize += size;
    if (totalSize > limits.maxRepoSize) {
      throw new PermanentError(`Repository exceeds maximum size (${limits.maxRepoSize} bytes)`);
    }

    allFiles.push(relPath);
    if (allFiles.length > limits.maxTotalFiles) {
      throw new PermanentError(`Repository exceeds maximum file count (${limits.maxTotalFiles})`);
    }
  }

  const filtered = applyPatterns(allFiles, patterns);
  if (allFiles.length > 0 && filtered.length / allFiles.length < 0.1) {
    logger.warn(`Include/exclude patterns pruned >90% of files (${allFiles.length} -> ${filtered.length})`);
  }
  logger.info(`Scanned ${allFiles.length} files, ${filtered.length} after filtering`);

  return filtered;
}

/**
 * First README found in the directory, or an empty string.
 */
export async function readReadme(dir: string, logger: Logger = silentLogger): Promise<string> {
  for (const candidate of README_CANDIDATES) {
    try {
      const content = await fs.readFile(path.join(dir, candidate), 'utf-8');
      logger.debug(`Found README at ${candidate}`);
      return content;
    } catch {
      continue;
    }
  }
  logger.debug(`No README found in ${dir}`);
  return '';
}

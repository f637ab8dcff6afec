/**
 * Scope configuration
 *
 * Each directory holding a `.wikiforge.json` is a documentation scope with
 * its own include/exclude patterns, style and README options. The repository
 * root is always a scope, with defaults when it has no file.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { z } from 'zod';
import { PermanentError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { DETAIL_LEVELS } from '../prompts/style.js';

export const SCOPE_CONFIG_FILENAME = '.wikiforge.json';

const styleSchema = z
  .object({
    audience: z.string().min(1).default('developer'),
    tone: z.string().min(1).default('technical'),
    detailLevel: z.enum(DETAIL_LEVELS).default('standard'),
  })
  .default({});

const readmeSchema = z
  .object({
    outputPath: z.string().min(1).default('README.md'),
    maxLength: z.number().int().positive().nullable().default(null),
    includeToc: z.boolean().default(true),
    includeBadges: z.boolean().default(false),
  })
  .default({});

export const scopeConfigSchema = z.object({
  version: z.literal(1).default(1),
  include: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
  style: styleSchema,
  customInstructions: z.string().default(''),
  readme: readmeSchema,
});

export type ScopeConfigFile = z.output<typeof scopeConfigSchema>;

export interface ScopeConfig extends ScopeConfigFile {
  /** Directory relative to the repository root, "." for the root */
  scopePath: string;
  warnings: string[];
}

const KNOWN_KEYS: Record<string, readonly string[]> = {
  '': Object.keys(scopeConfigSchema.shape),
  style: ['audience', 'tone', 'detailLevel'],
  readme: ['outputPath', 'maxLength', 'includeToc', 'includeBadges'],
};

function unknownKeyWarnings(raw: unknown): string[] {
  const warnings: string[] = [];
  const check = (value: unknown, section: string) => {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return;
    for (const key of Object.keys(value)) {
      if (!KNOWN_KEYS[section].includes(key)) {
        warnings.push(`Unknown config key: ${section ? `${section}.` : ''}${key}`);
      }
    }
  };

  check(raw, '');
  if (typeof raw === 'object' && raw !== null && !Array.isArray(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      if (key === 'style' || key === 'readme') check(value, key);
    }
  }
  return warnings;
}

/**
 * Validate a parsed config document. Unknown keys become warnings; invalid
 * values raise a PermanentError naming every offending path.
 */
export function parseScopeConfig(raw: unknown, scopePath = '.'): ScopeConfig {
  const result = scopeConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new PermanentError(`Invalid ${SCOPE_CONFIG_FILENAME} in scope '${scopePath}': ${issues.join('; ')}`);
  }
  return { ...result.data, scopePath, warnings: unknownKeyWarnings(raw) };
}

/**
 * Load the config of one scope directory. A missing file yields defaults.
 */
export async function loadScopeConfig(repoPath: string, scopePath = '.', logger: Logger = silentLogger): Promise<ScopeConfig> {
  const configPath = path.join(repoPath, scopePath, SCOPE_CONFIG_FILENAME);

  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch {
    return parseScopeConfig({}, scopePath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PermanentError(`${configPath} is not valid JSON`, { cause: error });
  }

  const config = parseScopeConfig(raw, scopePath);
  for (const warning of config.warnings) {
    logger.warn(`${scopePath}: ${warning}`);
  }
  return config;
}

/**
 * Every scope in the repository, root first. A parent scope excludes the
 * sub-trees of the scopes nested inside it.
 */
export async function discoverScopes(repoPath: string, logger: Logger = silentLogger): Promise<ScopeConfig[]> {
  const found = await glob(`**/${SCOPE_CONFIG_FILENAME}`, {
    cwd: repoPath,
    dot: true,
    posix: true,
    ignore: ['**/node_modules/**', '**/.git/**'],
  });

  const scopePaths = new Set<string>(['.']);
  for (const file of found) {
    scopePaths.add(path.posix.dirname(file));
  }
  const ordered = [...scopePaths].sort((a, b) => (a === '.' ? -1 : b === '.' ? 1 : a.localeCompare(b)));

  const configs: ScopeConfig[] = [];
  for (const scopePath of ordered) {
    const config = await loadScopeConfig(repoPath, scopePath, logger);
    const nested = ordered.filter((other) => other !== scopePath && isWithinScope(other, scopePath));
    config.exclude = [...config.exclude, ...nested.map((child) => relativeToScope(child, scopePath))];
    configs.push(config);
  }

  logger.info(`Discovered ${configs.length} scope(s): ${ordered.join(', ')}`);
  return configs;
}

/** Whether a repository-relative path lies inside the scope directory */
export function isWithinScope(repoRelativePath: string, scopePath: string): boolean {
  if (scopePath === '.') return true;
  return repoRelativePath === scopePath || repoRelativePath.startsWith(`${scopePath}/`);
}

export function relativeToScope(repoRelativePath: string, scopePath: string): string {
  if (scopePath === '.') return repoRelativePath;
  return repoRelativePath === scopePath ? '.' : repoRelativePath.slice(scopePath.length + 1);
}

/**
 * Incremental updates
 *
 * Given the files changed since the last generation, regenerate only the
 * pages whose sources changed and carry every other page forward into the
 * new structure version. A change to a manifest or scope config re-plans
 * the whole structure first.
 */

import * as path from 'path';
import type { AgentResult } from '../agents/quality-loop.js';
import { flattenPages, type WikiStructureSpec } from '../agents/schemas.js';
import { PermanentError } from '../errors.js';
import type { PipelineContext } from './context.js';
import { applyPatterns } from './scan.js';
import { isWithinScope, relativeToScope, SCOPE_CONFIG_FILENAME, type ScopeConfig } from './scope-config.js';
import {
  distillScopeReadme,
  embedPages,
  generatePages,
  planStructure,
  type ScopeResult,
  type ScopeRun,
} from './scope-processing.js';

export const STRUCTURAL_FILENAMES: ReadonlySet<string> = new Set([
  SCOPE_CONFIG_FILENAME,
  'package.json',
  'tsconfig.json',
  '__init__.py',
  'setup.py',
  'setup.cfg',
  'pyproject.toml',
  'cargo.toml',
  'go.mod',
]);

/**
 * True when any changed file is a manifest, package marker or scope config.
 * Matching is on the lowercased basename only.
 */
export function detectStructuralChanges(changedFiles: Iterable<string>): boolean {
  for (const file of changedFiles) {
    if (STRUCTURAL_FILENAMES.has(path.posix.basename(file).toLowerCase())) {
      return true;
    }
  }
  return false;
}

/**
 * A page is affected when any of its source files changed. No transitive
 * dependency analysis.
 */
export function partitionPages<T extends { sourceFiles: readonly string[] }>(
  pages: readonly T[],
  changedFiles: Iterable<string>
): { affected: T[]; unchanged: T[] } {
  const changed = new Set(changedFiles);
  const affected: T[] = [];
  const unchanged: T[] = [];
  for (const page of pages) {
    (page.sourceFiles.some((file) => changed.has(file)) ? affected : unchanged).push(page);
  }
  return { affected, unchanged };
}

/**
 * Repository-relative changed paths that belong to the scope, made relative
 * to the scope directory. Files in nested scopes are left to those scopes.
 */
export function changedFilesForScope(changedFiles: readonly string[], scope: ScopeConfig): string[] {
  const inScope = changedFiles
    .filter((file) => isWithinScope(file, scope.scopePath))
    .map((file) => relativeToScope(file, scope.scopePath));
  return applyPatterns(inScope, { include: [], exclude: scope.exclude });
}

/**
 * Incremental update of one scope.
 *
 * @param changedFiles paths relative to the scope directory
 * @throws PermanentError when the scope has never been generated
 */
export async function processScopeIncremental(
  ctx: PipelineContext,
  run: ScopeRun,
  changedFiles: readonly string[]
): Promise<ScopeResult> {
  const { store } = ctx;
  const scopePath = run.scope.scopePath;
  const logger = ctx.logger.child(scopePath);

  const prior = await store.getLatestStructure(run.repositoryId, run.branch, scopePath);
  if (!prior) {
    throw new PermanentError(`No prior structure found for scope '${scopePath}'; run full generation first.`);
  }
  const priorPages = await store.getPagesForStructure(prior.id);

  let structureResult: AgentResult<WikiStructureSpec> | null = null;
  let plan: WikiStructureSpec = { title: prior.title, description: prior.description, sections: prior.sections };

  if (detectStructuralChanges(changedFiles)) {
    logger.info(`Structural changes detected, re-extracting structure for scope '${scopePath}'`);
    structureResult = await planStructure(ctx, run);
    if (structureResult.output) {
      plan = structureResult.output;
    }
  } else {
    logger.info(`No structural changes for scope '${scopePath}', reusing prior structure`);
  }

  const structure = await store.createStructureVersion({
    repositoryId: run.repositoryId,
    branch: run.branch,
    scopePath,
    title: plan.title,
    description: plan.description,
    sections: plan.sections,
    commitSha: run.commitSha,
    jobId: run.jobId,
  });

  const specs = flattenPages(plan).map(({ page }) => page);
  const priorKeys = new Set(priorPages.map((p) => p.pageKey));
  const { affected, unchanged } = partitionPages(specs, changedFiles);

  // Planned pages with nothing to copy from are generated as well
  const toCopy = unchanged.filter((spec) => priorKeys.has(spec.pageKey));
  const toGenerate = [...affected, ...unchanged.filter((spec) => !priorKeys.has(spec.pageKey))];

  const copied = await store.duplicatePages(
    prior.id,
    structure.id,
    toCopy.map((spec) => spec.pageKey)
  );
  logger.info(`Regenerating ${toGenerate.length} page(s), carrying forward ${copied.length}`);

  const pages = await generatePages(ctx, run, structure.id, toGenerate);

  const [readmeResult, chunkCount] = await Promise.all([
    distillScopeReadme(ctx, run, structure),
    embedPages(ctx, pages.saved),
  ]);

  return {
    scopePath,
    structureId: structure.id,
    structureResult,
    pageResults: pages.pageResults,
    readmeResult,
    readme: readmeResult?.output?.content ?? null,
    chunkCount,
    regeneratedPageKeys: pages.saved.map((p) => p.pageKey),
    copiedPageKeys: copied.map((p) => p.pageKey),
    failedPageKeys: pages.failedPageKeys,
  };
}

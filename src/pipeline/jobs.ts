/**
 * Job runners
 *
 * A job covers every scope of one repository branch. Runners never throw:
 * whatever goes wrong ends up as a FAILED job with a readable message.
 */

import type { TokenUsageSnapshot } from '../agents/token-usage.js';
import { errorMessage, PermanentError } from '../errors.js';
import { changedPaths } from '../git/repository.js';
import type { JobMode, JobRecord } from '../store/types.js';
import type { PipelineContext } from './context.js';
import { changedFilesForScope, processScopeIncremental } from './incremental.js';
import { buildQualityReport, buildTokenReport, mergeQualityReports, type KeyedPageResult } from './metrics.js';
import { discoverScopes, type ScopeConfig } from './scope-config.js';
import { processScope, type ScopeResult, type ScopeRun } from './scope-processing.js';

export const QUALITY_GATE_FAILED = 'Quality gate failed: agent output below minimum floor';

export interface FullGenerationRequest {
  repositoryId: string;
  repoPath: string;
  branch: string;
  /** Defaults to the checkout's HEAD */
  commitSha?: string;
}

export interface IncrementalUpdateRequest extends FullGenerationRequest {
  /** Repository-relative paths; computed from git when omitted */
  changedFiles?: string[];
  /** Diff base; defaults to the newest stored structure's commit */
  baseSha?: string;
  /** Regenerate every scope in full, ignoring the diff */
  force?: boolean;
}

export interface JobOutcome {
  job: JobRecord;
  scopes: ScopeResult[];
}

interface ScopeFailure {
  scopePath: string;
  error: unknown;
}

function scopedKey(scopePath: string, pageKey: string): string {
  return scopePath === '.' ? pageKey : `${scopePath}/${pageKey}`;
}

/**
 * Quality gate and reports over every finished scope, then the final job
 * status.
 */
async function finishJob(
  ctx: PipelineContext,
  job: JobRecord,
  scopes: ScopeResult[],
  failures: ScopeFailure[],
  mode: JobMode
): Promise<JobRecord> {
  const threshold = ctx.settings.qualityThreshold;

  const reports = scopes.map((scope) => {
    const keyed: KeyedPageResult[] = scope.pageResults.map(({ pageKey, result }) => ({
      pageKey: scopedKey(scope.scopePath, pageKey),
      result,
    }));
    return buildQualityReport(scope.structureResult, keyed, scope.readmeResult, threshold);
  });
  const qualityReport = mergeQualityReports(reports, threshold);
  if (mode === 'incremental') {
    qualityReport.regeneratedPages = scopes.flatMap((s) => s.regeneratedPageKeys.map((k) => scopedKey(s.scopePath, k)));
  }

  const byAgent: Record<string, TokenUsageSnapshot[]> = { structureExtractor: [], pageGenerator: [], readmeDistiller: [] };
  for (const scope of scopes) {
    if (scope.structureResult) byAgent.structureExtractor.push(scope.structureResult.tokenUsage);
    byAgent.pageGenerator.push(...scope.pageResults.map(({ result }) => result.tokenUsage));
    if (scope.readmeResult) byAgent.readmeDistiller.push(scope.readmeResult.tokenUsage);
  }
  const tokenUsage = buildTokenReport(byAgent);

  const belowFloor = scopes.some(
    (s) =>
      (s.structureResult?.belowMinimumFloor ?? false) ||
      (s.readmeResult?.belowMinimumFloor ?? false) ||
      s.pageResults.some(({ result }) => result.belowMinimumFloor)
  );

  let errorText: string | null = null;
  if (failures.length > 0) {
    errorText = failures.map((f) => `Scope '${f.scopePath}' failed: ${errorMessage(f.error)}`).join('; ');
  } else if (belowFloor) {
    errorText = QUALITY_GATE_FAILED;
  }

  ctx.logger.info(
    `Job ${job.id}: overall=${qualityReport.overallScore.toFixed(2)}, pages=${qualityReport.totalPages}, tokens=${tokenUsage.total.totalTokens}`
  );

  return ctx.store.updateJob(job.id, {
    status: errorText ? 'FAILED' : 'COMPLETED',
    errorMessage: errorText,
    qualityReport,
    tokenUsage,
  });
}

async function runScopes(
  scopes: ScopeConfig[],
  processOne: (scope: ScopeConfig) => Promise<ScopeResult | null>,
  ctx: PipelineContext
): Promise<{ results: ScopeResult[]; failures: ScopeFailure[] }> {
  const settled = await Promise.allSettled(scopes.map((scope) => processOne(scope)));
  const results: ScopeResult[] = [];
  const failures: ScopeFailure[] = [];

  settled.forEach((outcome, i) => {
    const scopePath = scopes[i].scopePath;
    if (outcome.status === 'rejected') {
      ctx.logger.error(`Scope '${scopePath}' failed: ${errorMessage(outcome.reason)}`);
      failures.push({ scopePath, error: outcome.reason });
    } else if (outcome.value) {
      results.push(outcome.value);
    }
  });

  return { results, failures };
}

async function failJob(ctx: PipelineContext, job: JobRecord, error: unknown): Promise<JobRecord> {
  ctx.logger.error(`Job ${job.id} failed: ${errorMessage(error)}`);
  return ctx.store.updateJob(job.id, { status: 'FAILED', errorMessage: errorMessage(error) });
}

async function startJob(ctx: PipelineContext, job: JobRecord, request: FullGenerationRequest): Promise<{ job: JobRecord; commitSha: string; scopes: ScopeConfig[] }> {
  const running = await ctx.store.updateJob(job.id, { status: 'RUNNING' });
  const commitSha = request.commitSha ?? (await ctx.git.getHeadCommit(request.repoPath));
  const scopes = await discoverScopes(request.repoPath, ctx.logger);
  const configWarnings = scopes.flatMap((s) => s.warnings.map((w) => `${s.scopePath}: ${w}`));
  const updated = await ctx.store.updateJob(running.id, { commitSha, configWarnings });
  return { job: updated, commitSha, scopes };
}

function scopeRun(request: FullGenerationRequest, job: JobRecord, commitSha: string, scope: ScopeConfig): ScopeRun {
  return {
    repositoryId: request.repositoryId,
    jobId: job.id,
    branch: request.branch,
    commitSha,
    repoPath: request.repoPath,
    scope,
  };
}

/**
 * Generate the wiki for every scope from scratch. Scopes run concurrently.
 */
export async function runFullGeneration(ctx: PipelineContext, request: FullGenerationRequest): Promise<JobOutcome> {
  const created = await ctx.store.createJob({
    repositoryId: request.repositoryId,
    branch: request.branch,
    mode: 'full',
    force: false,
    commitSha: request.commitSha ?? null,
  });

  try {
    const { job, commitSha, scopes } = await startJob(ctx, created, request);
    const { results, failures } = await runScopes(scopes, (scope) => processScope(ctx, scopeRun(request, job, commitSha, scope)), ctx);
    return { job: await finishJob(ctx, job, results, failures, 'full'), scopes: results };
  } catch (error) {
    return { job: await failJob(ctx, created, error), scopes: [] };
  }
}

/**
 * Update the wiki from the files changed since the last generation.
 *
 * Scopes without a prior structure are generated in full; scopes none of the
 * changed files belong to are left alone.
 */
export async function runIncrementalUpdate(ctx: PipelineContext, request: IncrementalUpdateRequest): Promise<JobOutcome> {
  const force = request.force ?? false;
  const created = await ctx.store.createJob({
    repositoryId: request.repositoryId,
    branch: request.branch,
    mode: 'incremental',
    force,
    commitSha: request.commitSha ?? null,
  });

  try {
    const { job, commitSha, scopes } = await startJob(ctx, created, request);

    const diffs = new Map<string, Promise<string[]>>();
    const diffSince = (baseSha: string): Promise<string[]> => {
      let pending = diffs.get(baseSha);
      if (!pending) {
        pending = ctx.git.getChangedFiles(request.repoPath, baseSha, commitSha).then(changedPaths);
        diffs.set(baseSha, pending);
      }
      return pending;
    };

    let changed: string[] = [];
    if (!force) {
      changed = request.changedFiles ?? (await detectChanges(ctx, request, commitSha, diffSince));
      ctx.logger.info(`Incremental diff: ${changed.length} changed file(s)`);

      if (changed.length === 0) {
        const done = await ctx.store.updateJob(job.id, { status: 'COMPLETED', noChanges: true });
        return { job: done, scopes: [] };
      }
    }

    const { results, failures } = await runScopes(
      scopes,
      async (scope) => {
        const run = scopeRun(request, job, commitSha, scope);
        const prior = await ctx.store.getLatestStructure(request.repositoryId, request.branch, scope.scopePath);
        if (force || !prior) {
          if (!prior) ctx.logger.info(`Scope '${scope.scopePath}' has no prior structure, generating in full`);
          return processScope(ctx, run);
        }

        // Without an explicit file list or base, each scope diffs from its own last commit
        let since = changed;
        if (!request.changedFiles && !request.baseSha) {
          since = prior.commitSha === commitSha ? [] : await diffSince(prior.commitSha);
        }
        const scoped = changedFilesForScope(since, scope);
        if (scoped.length === 0) {
          ctx.logger.debug(`No changes in scope '${scope.scopePath}'`);
          return null;
        }
        return processScopeIncremental(ctx, run, scoped);
      },
      ctx
    );

    return { job: await finishJob(ctx, job, results, failures, 'incremental'), scopes: results };
  } catch (error) {
    return { job: await failJob(ctx, created, error), scopes: [] };
  }
}

async function detectChanges(
  ctx: PipelineContext,
  request: IncrementalUpdateRequest,
  headSha: string,
  diffSince: (baseSha: string) => Promise<string[]>
): Promise<string[]> {
  const baseSha = request.baseSha ?? (await ctx.store.getBaselineSha(request.repositoryId, request.branch));
  if (!baseSha) {
    throw new PermanentError('No existing wiki structures found for incremental update. Run full generation first.');
  }
  if (baseSha === headSha) {
    return [];
  }
  return diffSince(baseSha);
}

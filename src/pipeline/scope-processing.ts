/**
 * Scope processing
 *
 * Full generation for one scope: scan, plan the structure, write every page,
 * then distill the README while the pages are chunked and embedded.
 */

import * as path from 'path';
import { generatePage } from '../agents/page-generator.js';
import type { AgentResult } from '../agents/quality-loop.js';
import { distillReadme } from '../agents/readme-distiller.js';
import { flattenPages, type GeneratedPage, type PageSpec, type ReadmeOutput, type WikiStructureSpec } from '../agents/schemas.js';
import { extractStructure } from '../agents/structure-extractor.js';
import { errorMessage, PermanentError, QualityError, TimeoutError, withTimeout } from '../errors.js';
import { chunkMarkdown, type ChunkResult } from '../rag/chunker.js';
import type { NewChunk, PageRecord, StructureRecord } from '../store/types.js';
import type { PipelineContext } from './context.js';
import type { KeyedPageResult } from './metrics.js';
import { readReadme, scanFiles } from './scan.js';
import type { ScopeConfig } from './scope-config.js';

export interface ScopeRun {
  repositoryId: string;
  jobId: string | null;
  branch: string;
  commitSha: string;
  /** Repository root on disk */
  repoPath: string;
  scope: ScopeConfig;
}

export interface ScopeResult {
  scopePath: string;
  structureId: string;
  /** Null when an incremental run reused the prior structure */
  structureResult: AgentResult<WikiStructureSpec> | null;
  pageResults: KeyedPageResult[];
  readmeResult: AgentResult<ReadmeOutput> | null;
  readme: string | null;
  chunkCount: number;
  regeneratedPageKeys: string[];
  copiedPageKeys: string[];
  failedPageKeys: string[];
}

export function scopeDirectory(run: Pick<ScopeRun, 'repoPath' | 'scope'>): string {
  return path.join(run.repoPath, run.scope.scopePath);
}

/**
 * Scan the scope and run the structure extractor under the agent timeout.
 *
 * @throws QualityError when no structure was produced or it is below its floor
 */
export async function planStructure(ctx: PipelineContext, run: ScopeRun): Promise<AgentResult<WikiStructureSpec>> {
  const { settings } = ctx;
  const dir = scopeDirectory(run);
  const logger = ctx.logger.child(run.scope.scopePath);

  const fileList = await scanFiles(dir, run.scope, settings, logger);
  const readmeContent = await readReadme(dir, logger);

  const result = await withTimeout(
    extractStructure(ctx, {
      fileList,
      repoPath: dir,
      readmeContent,
      customInstructions: run.scope.customInstructions,
      style: run.scope.style,
    }),
    settings.agentTimeoutMs,
    `Structure extraction for scope '${run.scope.scopePath}'`
  );

  if (!result.output || result.belowMinimumFloor) {
    throw new QualityError(
      `Structure extraction below minimum floor for scope '${run.scope.scopePath}' (score=${result.finalScore})`
    );
  }
  return result;
}

export interface PageBatchResult {
  pageResults: KeyedPageResult[];
  saved: PageRecord[];
  failedPageKeys: string[];
}

/**
 * Generate pages one after another, saving each as soon as it exists. A page
 * that throws is logged and skipped; timeouts and permanent errors end the run.
 */
export async function generatePages(
  ctx: PipelineContext,
  run: ScopeRun,
  structureId: string,
  specs: PageSpec[]
): Promise<PageBatchResult> {
  const logger = ctx.logger.child(run.scope.scopePath);
  const batch: PageBatchResult = { pageResults: [], saved: [], failedPageKeys: [] };

  for (const spec of specs) {
    let result: AgentResult<GeneratedPage>;
    try {
      result = await withTimeout(
        generatePage(ctx, {
          pageSpec: spec,
          repoPath: scopeDirectory(run),
          relatedPages: spec.relatedPages,
          customInstructions: run.scope.customInstructions,
          style: run.scope.style,
        }),
        ctx.settings.agentTimeoutMs,
        `Page generation for '${spec.pageKey}'`
      );
    } catch (error) {
      if (error instanceof TimeoutError || error instanceof PermanentError) {
        throw error;
      }
      logger.error(`Failed to generate page '${spec.pageKey}': ${errorMessage(error)}`);
      batch.failedPageKeys.push(spec.pageKey);
      continue;
    }

    batch.pageResults.push({ pageKey: spec.pageKey, result });
    if (!result.output) {
      logger.warn(`No usable output for page '${spec.pageKey}'`);
      batch.failedPageKeys.push(spec.pageKey);
      continue;
    }

    const [page] = await ctx.store.createPages(structureId, [
      {
        ...spec,
        content: result.output.content,
        qualityScore: result.finalScore,
        passedQualityGate: result.passedQualityGate,
        belowMinimumFloor: result.belowMinimumFloor,
        attempts: result.attempts,
        tokenUsage: result.tokenUsage.toJSON(),
      },
    ]);
    batch.saved.push(page);
    logger.info(`Generated page '${spec.pageKey}' (score=${result.finalScore.toFixed(2)}, attempts=${result.attempts})`);
  }

  return batch;
}

/**
 * Chunk every page and store the chunks with one embedding each.
 * Returns the number of chunks written.
 */
export async function embedPages(ctx: PipelineContext, pages: PageRecord[]): Promise<number> {
  const { settings } = ctx;
  const pending: Array<{ pageId: string; chunkIndex: number; chunk: ChunkResult }> = [];

  for (const page of pages) {
    const chunks = chunkMarkdown(page.content, {
      maxTokens: settings.chunkMaxTokens,
      overlapTokens: settings.chunkOverlapTokens,
      minTokens: settings.chunkMinTokens,
    });
    chunks.forEach((chunk, chunkIndex) => pending.push({ pageId: page.id, chunkIndex, chunk }));
  }

  if (pending.length === 0) {
    return 0;
  }

  ctx.logger.debug(`Embedding ${pending.length} chunks from ${pages.length} pages`);
  const vectors = await ctx.embedder.embedBatch(pending.map(({ chunk }) => chunk.content));
  if (vectors.length !== pending.length) {
    throw new Error(`Embedder returned ${vectors.length} vectors for ${pending.length} chunks`);
  }

  const records: NewChunk[] = pending.map(({ pageId, chunkIndex, chunk }, i) => ({
    pageId,
    chunkIndex,
    content: chunk.content,
    embedding: vectors[i],
    headingPath: chunk.headingPath,
    headingLevel: chunk.headingLevel,
    tokenCount: chunk.tokenCount,
    startChar: chunk.startChar,
    endChar: chunk.endChar,
    hasCode: chunk.hasCode,
  }));
  await ctx.store.createChunks(records);
  return records.length;
}

/**
 * Distill the README from the structure's saved pages and store it on the
 * structure. Returns null when there is nothing to distill from.
 */
export async function distillScopeReadme(
  ctx: PipelineContext,
  run: ScopeRun,
  structure: Pick<StructureRecord, 'id' | 'title' | 'description'>
): Promise<AgentResult<ReadmeOutput> | null> {
  const pages = await ctx.store.getPagesForStructure(structure.id);
  if (pages.length === 0) {
    ctx.logger.warn(`No pages in scope '${run.scope.scopePath}', skipping README`);
    return null;
  }

  const result = await withTimeout(
    distillReadme(ctx, {
      pages: pages.map(({ pageKey, title, description, content }) => ({ pageKey, title, description, content })),
      projectTitle: structure.title,
      projectDescription: structure.description,
      customInstructions: run.scope.customInstructions,
      maxLength: run.scope.readme.maxLength,
      includeToc: run.scope.readme.includeToc,
      includeBadges: run.scope.readme.includeBadges,
      style: run.scope.style,
    }),
    ctx.settings.agentTimeoutMs,
    `README distillation for scope '${run.scope.scopePath}'`
  );

  if (result.output) {
    await ctx.store.setStructureReadme(structure.id, { content: result.output.content, score: result.finalScore });
  }
  return result;
}

/**
 * Full generation for one scope.
 */
export async function processScope(ctx: PipelineContext, run: ScopeRun): Promise<ScopeResult> {
  const logger = ctx.logger.child(run.scope.scopePath);
  const structureResult = await planStructure(ctx, run);
  const spec = structureResult.output;
  if (!spec) {
    throw new QualityError(`No structure produced for scope '${run.scope.scopePath}'`);
  }

  const structure = await ctx.store.createStructureVersion({
    repositoryId: run.repositoryId,
    branch: run.branch,
    scopePath: run.scope.scopePath,
    title: spec.title,
    description: spec.description,
    sections: spec.sections,
    commitSha: run.commitSha,
    jobId: run.jobId,
  });
  logger.info(`Stored structure v${structure.version} with ${flattenPages(spec).length} planned pages`);

  const specs = flattenPages(spec).map(({ page }) => page);
  const pages = await generatePages(ctx, run, structure.id, specs);

  const [readmeResult, chunkCount] = await Promise.all([
    distillScopeReadme(ctx, run, structure),
    embedPages(ctx, pages.saved),
  ]);

  return {
    scopePath: run.scope.scopePath,
    structureId: structure.id,
    structureResult,
    pageResults: pages.pageResults,
    readmeResult,
    readme: readmeResult?.output?.content ?? null,
    chunkCount,
    regeneratedPageKeys: pages.saved.map((p) => p.pageKey),
    copiedPageKeys: [],
    failedPageKeys: pages.failedPageKeys,
  };
}

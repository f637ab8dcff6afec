/**
 * JSON file store
 *
 * Keeps everything in memory and, when given a path, mirrors it to a single
 * JSON file after every write (temp file + rename). Without a path it is a
 * plain in-memory store.
 */

import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { cosineSimilarity } from '../rag/embeddings.js';
import { PermanentError } from '../errors.js';
import {
  MAX_STRUCTURE_VERSIONS,
  type ChunkRecord,
  type ChunkSearchOptions,
  type ChunkSearchResult,
  type JobPatch,
  type JobRecord,
  type NewChunk,
  type NewJob,
  type NewPage,
  type NewStructure,
  type PageRecord,
  type PageSearchResult,
  type RepositoryProvider,
  type RepositoryRecord,
  type StructureRecord,
  type WikiStore,
} from './types.js';

interface StoreData {
  formatVersion: 1;
  repositories: RepositoryRecord[];
  structures: StructureRecord[];
  pages: PageRecord[];
  chunks: ChunkRecord[];
  jobs: JobRecord[];
}

function emptyData(): StoreData {
  return { formatVersion: 1, repositories: [], structures: [], pages: [], chunks: [], jobs: [] };
}

const now = () => new Date().toISOString();

const HEADING_LINE = /^#{1,6}\s+(.+)$/gm;

export class JsonFileStore implements WikiStore {
  private data: StoreData;
  private readonly filePath: string | null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(filePath: string | null = null, data: StoreData = emptyData()) {
    this.filePath = filePath;
    this.data = data;
  }

  /**
   * Open a store file, starting empty when it does not exist yet.
   */
  static async open(filePath: string): Promise<JsonFileStore> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, 'utf-8');
    } catch {
      return new JsonFileStore(filePath);
    }

    let data: StoreData;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new PermanentError(`Store file is not valid JSON: ${filePath}`, { cause: error });
    }
    if (data.formatVersion !== 1 || !Array.isArray(data.structures) || !Array.isArray(data.pages)) {
      throw new PermanentError(`Unsupported store file format: ${filePath}`);
    }
    return new JsonFileStore(filePath, data);
  }

  // --- repositories -------------------------------------------------------

  async upsertRepository(input: { url: string; provider: RepositoryProvider; defaultBranch: string }): Promise<RepositoryRecord> {
    const existing = this.data.repositories.find((r) => r.url === input.url);
    if (existing) {
      existing.provider = input.provider;
      existing.defaultBranch = input.defaultBranch;
      await this.persist();
      return { ...existing };
    }

    const record: RepositoryRecord = { id: randomUUID(), ...input, createdAt: now() };
    this.data.repositories.push(record);
    await this.persist();
    return { ...record };
  }

  async getRepository(id: string): Promise<RepositoryRecord | null> {
    const record = this.data.repositories.find((r) => r.id === id);
    return record ? { ...record } : null;
  }

  async findRepositoryByUrl(url: string): Promise<RepositoryRecord | null> {
    const record = this.data.repositories.find((r) => r.url === url);
    return record ? { ...record } : null;
  }

  // --- structures ---------------------------------------------------------

  async createStructureVersion(input: NewStructure): Promise<StructureRecord> {
    const existing = this.scopeStructures(input.repositoryId, input.branch, input.scopePath);
    const nextVersion = existing.length > 0 ? existing[existing.length - 1].version + 1 : 1;

    const expired = existing.slice(0, Math.max(0, existing.length - MAX_STRUCTURE_VERSIONS + 1));
    for (const structure of expired) {
      this.deleteStructure(structure.id);
    }

    const record: StructureRecord = {
      ...input,
      id: randomUUID(),
      version: nextVersion,
      readme: null,
      createdAt: now(),
    };
    this.data.structures.push(record);
    await this.persist();
    return structuredClone(record);
  }

  async getLatestStructure(repositoryId: string, branch: string, scopePath: string): Promise<StructureRecord | null> {
    const versions = this.scopeStructures(repositoryId, branch, scopePath);
    const latest = versions[versions.length - 1];
    return latest ? structuredClone(latest) : null;
  }

  async getLatestStructures(repositoryId: string, branch: string): Promise<StructureRecord[]> {
    return this.latestByScope(repositoryId, branch).map((s) => structuredClone(s));
  }

  async getStructuresForRepository(repositoryId: string, branch?: string): Promise<StructureRecord[]> {
    return this.data.structures
      .filter((s) => s.repositoryId === repositoryId && (branch === undefined || s.branch === branch))
      .map((s) => structuredClone(s));
  }

  async setStructureReadme(structureId: string, readme: { content: string; score: number }): Promise<void> {
    const structure = this.data.structures.find((s) => s.id === structureId);
    if (!structure) {
      throw new Error(`Structure not found: ${structureId}`);
    }
    structure.readme = { ...readme };
    await this.persist();
  }

  /**
   * Commit of the oldest among each scope's latest structure, so a scope that
   * failed to update keeps its changes inside the next diff.
   */
  async getBaselineSha(repositoryId: string, branch: string): Promise<string | null> {
    const latest = new Set(this.latestByScope(repositoryId, branch));
    // Insertion order is creation order
    return this.data.structures.find((s) => latest.has(s))?.commitSha ?? null;
  }

  // --- pages --------------------------------------------------------------

  async createPages(structureId: string, pages: NewPage[]): Promise<PageRecord[]> {
    if (!this.data.structures.some((s) => s.id === structureId)) {
      throw new Error(`Structure not found: ${structureId}`);
    }
    const created = pages.map((page): PageRecord => ({ ...structuredClone(page), id: randomUUID(), structureId, createdAt: now() }));
    this.data.pages.push(...created);
    await this.persist();
    return created.map((p) => structuredClone(p));
  }

  async getPagesForStructure(structureId: string): Promise<PageRecord[]> {
    return this.data.pages.filter((p) => p.structureId === structureId).map((p) => structuredClone(p));
  }

  async getPageByKey(structureId: string, pageKey: string): Promise<PageRecord | null> {
    const page = this.data.pages.find((p) => p.structureId === structureId && p.pageKey === pageKey);
    return page ? structuredClone(page) : null;
  }

  async duplicatePages(fromStructureId: string, toStructureId: string, pageKeys: string[]): Promise<PageRecord[]> {
    const wanted = new Set(pageKeys);
    const copies: PageRecord[] = [];

    for (const page of this.data.pages.filter((p) => p.structureId === fromStructureId && wanted.has(p.pageKey))) {
      const copy: PageRecord = { ...structuredClone(page), id: randomUUID(), structureId: toStructureId };
      copies.push(copy);

      const chunks = this.data.chunks.filter((c) => c.pageId === page.id);
      this.data.chunks.push(...chunks.map((c) => ({ ...structuredClone(c), id: randomUUID(), pageId: copy.id })));
    }

    this.data.pages.push(...copies);
    await this.persist();
    return copies.map((p) => structuredClone(p));
  }

  // --- chunks -------------------------------------------------------------

  async createChunks(chunks: NewChunk[]): Promise<ChunkRecord[]> {
    const created = chunks.map((chunk): ChunkRecord => ({ ...structuredClone(chunk), id: randomUUID() }));
    this.data.chunks.push(...created);
    await this.persist();
    return created.map((c) => structuredClone(c));
  }

  async getChunksForPage(pageId: string): Promise<ChunkRecord[]> {
    return this.data.chunks
      .filter((c) => c.pageId === pageId)
      .sort((a, b) => a.chunkIndex - b.chunkIndex)
      .map((c) => structuredClone(c));
  }

  async searchChunks(repositoryId: string, queryVector: number[], options: ChunkSearchOptions = {}): Promise<ChunkSearchResult[]> {
    const limit = options.limit ?? 10;
    const results: ChunkSearchResult[] = [];

    for (const { structure, page } of this.searchablePages(repositoryId, options.branch, options.scopePath)) {
      for (const chunk of this.data.chunks) {
        if (chunk.pageId !== page.id) continue;
        results.push({ chunk, page, structure, score: cosineSimilarity(queryVector, chunk.embedding) });
      }
    }

    return results
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map((r) => structuredClone(r));
  }

  /**
   * Keyword scoring: title 10, description 5, heading 3, body 1 per query word.
   */
  async searchPagesByText(repositoryId: string, query: string, options: { limit?: number; branch?: string } = {}): Promise<PageSearchResult[]> {
    const limit = options.limit ?? 10;
    const keywords = query
      .toLowerCase()
      .split(/\s+/)
      .filter((w) => w.length > 2);
    if (keywords.length === 0) return [];

    const scored: PageSearchResult[] = [];
    for (const { structure, page } of this.searchablePages(repositoryId, options.branch)) {
      const title = page.title.toLowerCase();
      const description = page.description.toLowerCase();
      const content = page.content.toLowerCase();
      const headings = [...page.content.matchAll(HEADING_LINE)].map((m) => m[1].toLowerCase());

      let score = 0;
      for (const kw of keywords) {
        if (title.includes(kw)) score += 10;
        if (description.includes(kw)) score += 5;
        if (headings.some((h) => h.includes(kw))) score += 3;
        if (content.includes(kw)) score += 1;
      }
      if (score > 0) {
        scored.push({ page, structure, score });
      }
    }

    return scored
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map((r) => structuredClone(r));
  }

  // --- jobs ---------------------------------------------------------------

  async createJob(input: NewJob): Promise<JobRecord> {
    const timestamp = now();
    const job: JobRecord = {
      id: randomUUID(),
      repositoryId: input.repositoryId,
      branch: input.branch,
      mode: input.mode,
      force: input.force,
      status: 'PENDING',
      commitSha: input.commitSha ?? null,
      qualityReport: null,
      tokenUsage: null,
      configWarnings: [],
      errorMessage: null,
      noChanges: false,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.data.jobs.push(job);
    await this.persist();
    return structuredClone(job);
  }

  async updateJob(id: string, patch: JobPatch): Promise<JobRecord> {
    const job = this.data.jobs.find((j) => j.id === id);
    if (!job) {
      throw new Error(`Job not found: ${id}`);
    }
    Object.assign(job, structuredClone(patch), { updatedAt: now() });
    await this.persist();
    return structuredClone(job);
  }

  async getJob(id: string): Promise<JobRecord | null> {
    const job = this.data.jobs.find((j) => j.id === id);
    return job ? structuredClone(job) : null;
  }

  async listJobs(repositoryId: string): Promise<JobRecord[]> {
    return this.data.jobs.filter((j) => j.repositoryId === repositoryId).map((j) => structuredClone(j));
  }

  // --- internals ----------------------------------------------------------

  private scopeStructures(repositoryId: string, branch: string, scopePath: string): StructureRecord[] {
    return this.data.structures
      .filter((s) => s.repositoryId === repositoryId && s.branch === branch && s.scopePath === scopePath)
      .sort((a, b) => a.version - b.version);
  }

  private latestByScope(repositoryId: string, branch: string): StructureRecord[] {
    const latest = new Map<string, StructureRecord>();
    for (const structure of this.data.structures) {
      if (structure.repositoryId !== repositoryId || structure.branch !== branch) continue;
      const current = latest.get(structure.scopePath);
      if (!current || structure.version > current.version) {
        latest.set(structure.scopePath, structure);
      }
    }
    return [...latest.values()].sort((a, b) => a.scopePath.localeCompare(b.scopePath));
  }

  private *searchablePages(repositoryId: string, branch?: string, scopePath?: string): Generator<{ structure: StructureRecord; page: PageRecord }> {
    const repository = this.data.repositories.find((r) => r.id === repositoryId);
    const effectiveBranch = branch ?? repository?.defaultBranch ?? 'main';

    for (const structure of this.latestByScope(repositoryId, effectiveBranch)) {
      if (scopePath !== undefined && structure.scopePath !== scopePath) continue;
      for (const page of this.data.pages) {
        if (page.structureId === structure.id) {
          yield { structure, page };
        }
      }
    }
  }

  private deleteStructure(structureId: string): void {
    const pageIds = new Set(this.data.pages.filter((p) => p.structureId === structureId).map((p) => p.id));
    this.data.chunks = this.data.chunks.filter((c) => !pageIds.has(c.pageId));
    this.data.pages = this.data.pages.filter((p) => p.structureId !== structureId);
    this.data.structures = this.data.structures.filter((s) => s.id !== structureId);
  }

  private async persist(): Promise<void> {
    const filePath = this.filePath;
    if (!filePath) return;

    // Writes are serialized; an earlier failure was already reported to its own caller
    const next = this.writeChain
      .catch(() => undefined)
      .then(async () => {
        await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
        const tmp = `${filePath}.tmp`;
        await fs.promises.writeFile(tmp, JSON.stringify(this.data));
        await fs.promises.rename(tmp, filePath);
      });
    this.writeChain = next;
    await next;
  }
}

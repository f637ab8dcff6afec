/**
 * Storage contract for repositories, structure versions, pages, chunks and
 * jobs. Every call either succeeds or throws; nothing here is transactional.
 */

import type { TokenUsageSnapshot } from '../agents/token-usage.js';
import type { PageSpec, SectionSpec } from '../agents/schemas.js';
import type { QualityReport, TokenReport } from '../pipeline/metrics.js';

export const MAX_STRUCTURE_VERSIONS = 3;

export type RepositoryProvider = 'local' | 'github' | 'bitbucket' | 'git';

export interface RepositoryRecord {
  id: string;
  url: string;
  provider: RepositoryProvider;
  defaultBranch: string;
  createdAt: string;
}

export interface StructureRecord {
  id: string;
  repositoryId: string;
  branch: string;
  /** "." for the repository root */
  scopePath: string;
  version: number;
  title: string;
  description: string;
  sections: SectionSpec[];
  commitSha: string;
  jobId: string | null;
  readme: { content: string; score: number } | null;
  createdAt: string;
}

export interface PageRecord extends PageSpec {
  id: string;
  structureId: string;
  content: string;
  qualityScore: number;
  passedQualityGate: boolean;
  belowMinimumFloor: boolean;
  attempts: number;
  tokenUsage: TokenUsageSnapshot;
  createdAt: string;
}

export interface ChunkRecord {
  id: string;
  pageId: string;
  chunkIndex: number;
  content: string;
  embedding: number[];
  headingPath: string[];
  headingLevel: number;
  tokenCount: number;
  startChar: number;
  endChar: number;
  hasCode: boolean;
}

export type JobStatus = 'PENDING' | 'RUNNING' | 'COMPLETED' | 'FAILED';
export type JobMode = 'full' | 'incremental';

export interface JobRecord {
  id: string;
  repositoryId: string;
  branch: string;
  mode: JobMode;
  force: boolean;
  status: JobStatus;
  commitSha: string | null;
  qualityReport: QualityReport | null;
  tokenUsage: TokenReport | null;
  configWarnings: string[];
  errorMessage: string | null;
  noChanges: boolean;
  createdAt: string;
  updatedAt: string;
}

export type NewStructure = Omit<StructureRecord, 'id' | 'version' | 'createdAt' | 'readme'>;
export type NewPage = Omit<PageRecord, 'id' | 'structureId' | 'createdAt'>;
export type NewChunk = Omit<ChunkRecord, 'id'>;
export type NewJob = Pick<JobRecord, 'repositoryId' | 'branch' | 'mode' | 'force'> & { commitSha?: string | null };
export type JobPatch = Partial<Omit<JobRecord, 'id' | 'repositoryId' | 'createdAt'>>;

export interface ChunkSearchOptions {
  limit?: number;
  branch?: string;
  scopePath?: string;
}

export interface ChunkSearchResult {
  chunk: ChunkRecord;
  page: PageRecord;
  structure: StructureRecord;
  score: number;
}

export interface PageSearchResult {
  page: PageRecord;
  structure: StructureRecord;
  score: number;
}

export interface WikiStore {
  upsertRepository(input: { url: string; provider: RepositoryProvider; defaultBranch: string }): Promise<RepositoryRecord>;
  getRepository(id: string): Promise<RepositoryRecord | null>;
  findRepositoryByUrl(url: string): Promise<RepositoryRecord | null>;

  /** Adds version N+1 and drops the oldest when the scope already has three. */
  createStructureVersion(input: NewStructure): Promise<StructureRecord>;
  getLatestStructure(repositoryId: string, branch: string, scopePath: string): Promise<StructureRecord | null>;
  /** Latest version per scope, sorted by scope path */
  getLatestStructures(repositoryId: string, branch: string): Promise<StructureRecord[]>;
  getStructuresForRepository(repositoryId: string, branch?: string): Promise<StructureRecord[]>;
  setStructureReadme(structureId: string, readme: { content: string; score: number }): Promise<void>;
  /** Commit of the newest structure on the branch, across scopes */
  getBaselineSha(repositoryId: string, branch: string): Promise<string | null>;

  createPages(structureId: string, pages: NewPage[]): Promise<PageRecord[]>;
  getPagesForStructure(structureId: string): Promise<PageRecord[]>;
  getPageByKey(structureId: string, pageKey: string): Promise<PageRecord | null>;
  /** Copies pages (and their chunks) into another structure version. */
  duplicatePages(fromStructureId: string, toStructureId: string, pageKeys: string[]): Promise<PageRecord[]>;

  createChunks(chunks: NewChunk[]): Promise<ChunkRecord[]>;
  getChunksForPage(pageId: string): Promise<ChunkRecord[]>;
  searchChunks(repositoryId: string, queryVector: number[], options?: ChunkSearchOptions): Promise<ChunkSearchResult[]>;
  searchPagesByText(repositoryId: string, query: string, options?: { limit?: number; branch?: string }): Promise<PageSearchResult[]>;

  createJob(input: NewJob): Promise<JobRecord>;
  updateJob(id: string, patch: JobPatch): Promise<JobRecord>;
  getJob(id: string): Promise<JobRecord | null>;
  listJobs(repositoryId: string): Promise<JobRecord[]>;
}

/**
 * Fakes shared by the agent and pipeline tests.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { RoleFactory, RoleRequest } from '../src/agents/context.js';
import { TokenUsage } from '../src/agents/token-usage.js';
import { resolveSettings, type AgentRole, type Config, type Settings } from '../src/config.js';
import type { ChangedFile, GitProvider } from '../src/git/repository.js';
import type { Role, RoleResponse } from '../src/llm/role.js';
import { silentLogger } from '../src/logger.js';
import type { PipelineContext } from '../src/pipeline/context.js';
import type { Embedder } from '../src/rag/embeddings.js';
import { JsonFileStore } from '../src/store/json-store.js';

export type Responder = (prompt: string) => string;

export interface RoleCall {
  role: AgentRole;
  systemPrompt: string;
  prompt: string;
}

/**
 * Role factory answering through one responder per agent role. Every call is
 * recorded; a role without a responder throws when invoked.
 */
export function scriptedRoles(responders: Partial<Record<AgentRole, Responder>>): { factory: RoleFactory; calls: RoleCall[]; requests: RoleRequest[] } {
  const calls: RoleCall[] = [];
  const requests: RoleRequest[] = [];

  const factory: RoleFactory = (request) => {
    requests.push(request);
    const role: Role = {
      name: request.role,
      async invoke(prompt: string): Promise<RoleResponse> {
        calls.push({ role: request.role, systemPrompt: request.systemPrompt, prompt });
        const respond = responders[request.role];
        if (!respond) {
          throw new Error(`No responder for ${request.role}`);
        }
        return { text: respond(prompt), usage: TokenUsage.fromCall(10, 5) };
      },
    };
    return role;
  };

  return { factory, calls, requests };
}

export const critique = (score: number, criteria: Record<string, number> = {}) =>
  JSON.stringify({ score, passed: score >= 7, feedback: `scored ${score}`, criteria_scores: criteria });

export function testSettings(overrides: Config = {}): Settings {
  return resolveSettings({ storePath: 'unused.json', maxAgentAttempts: 2, ...overrides });
}

export class FakeGit implements GitProvider {
  head = 'sha-1';
  branch = 'main';
  changes: ChangedFile[] = [];
  /** Per-base answers; bases not listed get `changes` */
  changesByBase: Record<string, ChangedFile[]> = {};
  diffCalls: Array<{ base: string; head?: string }> = [];

  async clone(_url: string, dest: string): Promise<string> {
    return dest;
  }

  async getHeadCommit(): Promise<string> {
    return this.head;
  }

  async getCurrentBranch(): Promise<string> {
    return this.branch;
  }

  async getChangedFiles(_repoPath: string, baseSha: string, headSha?: string): Promise<ChangedFile[]> {
    this.diffCalls.push({ base: baseSha, head: headSha });
    return this.changesByBase[baseSha] ?? this.changes;
  }
}

/**
 * Letter-frequency vectors: deterministic and good enough for cosine ranking.
 */
export function letterVector(text: string): number[] {
  const vector = new Array<number>(26).fill(0);
  for (const ch of text.toLowerCase()) {
    const code = ch.charCodeAt(0) - 97;
    if (code >= 0 && code < 26) vector[code]++;
  }
  return vector;
}

export class FakeEmbedder implements Embedder {
  batches: string[][] = [];

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.batches.push(texts);
    return texts.map(letterVector);
  }

  async embed(text: string): Promise<number[]> {
    return letterVector(text);
  }
}

export function makeTempDir(prefix = 'wikiforge-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [relPath, content] of Object.entries(files)) {
    const target = path.join(root, relPath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

export function pipelineContext(
  responders: Partial<Record<AgentRole, Responder>>,
  overrides: Config = {}
): { ctx: PipelineContext; store: JsonFileStore; git: FakeGit; embedder: FakeEmbedder; calls: RoleCall[] } {
  const { factory, calls } = scriptedRoles(responders);
  const store = new JsonFileStore();
  const git = new FakeGit();
  const embedder = new FakeEmbedder();
  const ctx: PipelineContext = {
    settings: testSettings(overrides),
    createRole: factory,
    logger: silentLogger,
    store,
    embedder,
    git,
  };
  return { ctx, store, git, embedder, calls };
}

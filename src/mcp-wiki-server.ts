/**
 * MCP Server for querying a generated wiki
 *
 * Reads the latest structure version of every scope from a WikiStore and
 * exposes tools for:
 * - Keyword and semantic search over pages
 * - Reading a page, the page list or a scope's README
 * - Checking a generation job
 *
 * Pages are also listed as `wiki://<scope>/<pageKey>` resources.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { flattenPages } from './agents/schemas.js';
import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { Embedder } from './rag/embeddings.js';
import type { PageRecord, StructureRecord, WikiStore } from './store/types.js';

export interface WikiServerConfig {
  store: WikiStore;
  repositoryId: string;
  branch: string;
  /** Enables semantic_search */
  embedder?: Embedder;
  logger?: Logger;
}

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface WikiResource {
  uri: string;
  name: string;
  description?: string;
  mimeType: string;
}

const SNIPPET_LENGTH = 400;

const searchArgs = z.object({
  query: z.string().min(1),
  maxResults: z.number().int().positive().optional(),
});
const semanticArgs = searchArgs.extend({ scope: z.string().optional() });
const pageArgs = z.object({ pageKey: z.string().min(1), scope: z.string().optional() });
const listArgs = z.object({ scope: z.string().optional() });
const readmeArgs = z.object({ scope: z.string().default('.') });
const jobArgs = z.object({ jobId: z.string().min(1) });

const TOOLS: Tool[] = [
  {
    name: 'search_wiki',
    description: 'Search wiki pages by keyword. Returns matching pages with titles and descriptions.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search query (keywords to search for)' },
        maxResults: { type: 'number', description: 'Maximum number of results to return (default: 10)' },
      },
      required: ['query'],
    },
  },
  {
    name: 'semantic_search',
    description: 'Search wiki content by meaning. Returns the best matching sections with their heading path.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Natural language question or topic' },
        maxResults: { type: 'number', description: 'Maximum number of results (default: 5)' },
        scope: { type: 'string', description: 'Only search one scope (e.g. "." or "packages/api")' },
      },
      required: ['query'],
    },
  },
  {
    name: 'get_wiki_page',
    description: 'Get the full content of a wiki page by its page key.',
    inputSchema: {
      type: 'object',
      properties: {
        pageKey: { type: 'string', description: 'Page key, e.g. "auth-service"' },
        scope: { type: 'string', description: 'Scope path when the key exists in several scopes' },
      },
      required: ['pageKey'],
    },
  },
  {
    name: 'list_wiki_pages',
    description: 'List all wiki pages grouped by section.',
    inputSchema: {
      type: 'object',
      properties: {
        scope: { type: 'string', description: 'Only list one scope' },
      },
    },
  },
  {
    name: 'get_readme',
    description: 'Get the README distilled from a scope\'s wiki.',
    inputSchema: {
      type: 'object',
      properties: {
        scope: { type: 'string', description: 'Scope path (default: ".")' },
      },
    },
  },
  {
    name: 'get_job',
    description: 'Get the status and quality report of a generation job.',
    inputSchema: {
      type: 'object',
      properties: {
        jobId: { type: 'string', description: 'Job id' },
      },
      required: ['jobId'],
    },
  },
];

const text = (value: string, isError = false): ToolResult => (isError ? { content: [{ type: 'text', text: value }], isError } : { content: [{ type: 'text', text: value }] });

export function resourceUri(scopePath: string, pageKey: string): string {
  return `wiki://${scopePath}/${pageKey}`;
}

export function parseResourceUri(uri: string): { scopePath: string; pageKey: string } | null {
  if (!uri.startsWith('wiki://')) return null;
  const rest = uri.slice('wiki://'.length);
  const cut = rest.lastIndexOf('/');
  if (cut <= 0 || cut === rest.length - 1) return null;
  return { scopePath: rest.slice(0, cut), pageKey: rest.slice(cut + 1) };
}

export class WikiMCPServer {
  private server: Server;
  private config: WikiServerConfig;
  private logger: Logger;

  constructor(config: WikiServerConfig) {
    this.config = config;
    this.logger = config.logger ?? silentLogger;
    this.server = new Server(
      {
        name: 'wikiforge',
        version: '0.1.0',
      },
      {
        capabilities: {
          tools: {},
          resources: {},
        },
      }
    );

    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.callTool(request.params.name, request.params.arguments ?? {})
    );

    this.server.setRequestHandler(ListResourcesRequestSchema, async () => ({ resources: await this.listResources() }));

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const uri = request.params.uri;
      const page = await this.readResource(uri);
      return {
        contents: [
          page
            ? { uri, mimeType: 'text/markdown', text: page.content }
            : { uri, mimeType: 'text/plain', text: `Resource not found: ${uri}` },
        ],
      };
    });
  }

  /**
   * Dispatch one tool call. Bad arguments and store errors come back as
   * error results rather than exceptions.
   */
  async callTool(name: string, args: unknown): Promise<ToolResult> {
    try {
      switch (name) {
        case 'search_wiki':
          return await this.handleSearchWiki(searchArgs.parse(args));
        case 'semantic_search':
          return await this.handleSemanticSearch(semanticArgs.parse(args));
        case 'get_wiki_page':
          return await this.handleGetWikiPage(pageArgs.parse(args));
        case 'list_wiki_pages':
          return await this.handleListWikiPages(listArgs.parse(args));
        case 'get_readme':
          return await this.handleGetReadme(readmeArgs.parse(args));
        case 'get_job':
          return await this.handleGetJob(jobArgs.parse(args));
        default:
          return text(`Unknown tool: ${name}`, true);
      }
    } catch (error) {
      if (error instanceof z.ZodError) {
        const issues = error.issues.map((i) => `${i.path.join('.') || 'arguments'}: ${i.message}`).join('; ');
        return text(`Invalid arguments for ${name}: ${issues}`, true);
      }
      this.logger.error(`Tool ${name} failed: ${errorMessage(error)}`);
      return text(`Error running ${name}: ${errorMessage(error)}`, true);
    }
  }

  async listResources(): Promise<WikiResource[]> {
    const resources: WikiResource[] = [];
    for (const structure of await this.latestStructures()) {
      for (const page of await this.config.store.getPagesForStructure(structure.id)) {
        resources.push({
          uri: resourceUri(structure.scopePath, page.pageKey),
          name: page.title,
          description: page.description || undefined,
          mimeType: 'text/markdown',
        });
      }
    }
    return resources;
  }

  async readResource(uri: string): Promise<PageRecord | null> {
    const parsed = parseResourceUri(uri);
    if (!parsed) return null;
    return (await this.findPage(parsed.pageKey, parsed.scopePath))?.page ?? null;
  }

  private latestStructures(): Promise<StructureRecord[]> {
    return this.config.store.getLatestStructures(this.config.repositoryId, this.config.branch);
  }

  private async findPage(pageKey: string, scopePath?: string): Promise<{ page: PageRecord; structure: StructureRecord } | null> {
    for (const structure of await this.latestStructures()) {
      if (scopePath !== undefined && structure.scopePath !== scopePath) continue;
      const page = await this.config.store.getPageByKey(structure.id, pageKey);
      if (page) return { page, structure };
    }
    return null;
  }

  private async handleSearchWiki(args: z.infer<typeof searchArgs>): Promise<ToolResult> {
    const { query, maxResults = 10 } = args;
    const results = await this.config.store.searchPagesByText(this.config.repositoryId, query, {
      limit: maxResults,
      branch: this.config.branch,
    });

    if (results.length === 0) {
      return text(`No wiki pages found matching "${query}"`);
    }

    const resultText = results
      .map(({ page, structure, score }) => {
        return `## ${page.title}\n**Page:** ${page.pageKey} (scope ${structure.scopePath})\n${page.description ? `**Description:** ${page.description}\n` : ''}**Relevance Score:** ${score}`;
      })
      .join('\n\n---\n\n');

    return text(`Found ${results.length} matching wiki pages:\n\n${resultText}`);
  }

  private async handleSemanticSearch(args: z.infer<typeof semanticArgs>): Promise<ToolResult> {
    const { query, maxResults = 5, scope } = args;
    const embedder = this.config.embedder;
    if (!embedder) {
      return text('Semantic search is not available: no embedding model configured for this server.');
    }

    const [vector] = await embedder.embedBatch([query]);
    const results = await this.config.store.searchChunks(this.config.repositoryId, vector, {
      limit: maxResults,
      branch: this.config.branch,
      scopePath: scope,
    });

    if (results.length === 0) {
      return text(`No wiki content found for "${query}"`);
    }

    const resultText = results
      .map(({ chunk, page, score }, i) => {
        const where = chunk.headingPath.length > 0 ? chunk.headingPath.join(' > ') : page.title;
        const snippet = chunk.content.length > SNIPPET_LENGTH ? `${chunk.content.slice(0, SNIPPET_LENGTH)}...` : chunk.content;
        return `### ${i + 1}. ${page.title} / ${where}\n**Page:** ${page.pageKey} | **Similarity:** ${score.toFixed(3)}\n\n${snippet}`;
      })
      .join('\n\n---\n\n');

    return text(`Found ${results.length} matches for "${query}":\n\n${resultText}`);
  }

  private async handleGetWikiPage(args: z.infer<typeof pageArgs>): Promise<ToolResult> {
    const found = await this.findPage(args.pageKey, args.scope);

    if (!found) {
      const available = (await this.listResources()).map((r) => r.uri);
      return text(
        `Wiki page not found: ${args.pageKey}\n\nAvailable pages:\n${available.slice(0, 20).join('\n')}${available.length > 20 ? '\n...' : ''}`,
        true
      );
    }

    const { page } = found;
    const header = `# ${page.title}\n${page.description ? `> ${page.description}\n` : ''}\n**Sources:** ${page.sourceFiles.join(', ') || 'none'}\n**Quality score:** ${page.qualityScore.toFixed(1)}\n\n---\n\n`;
    return text(header + page.content);
  }

  private async handleListWikiPages(args: z.infer<typeof listArgs>): Promise<ToolResult> {
    const structures = (await this.latestStructures()).filter((s) => args.scope === undefined || s.scopePath === args.scope);

    let total = 0;
    let body = '';
    for (const structure of structures) {
      const stored = new Map((await this.config.store.getPagesForStructure(structure.id)).map((p) => [p.pageKey, p]));

      const bySection = new Map<string, PageRecord[]>();
      for (const { page: spec, sectionPath } of flattenPages(structure)) {
        const page = stored.get(spec.pageKey);
        if (!page) continue;
        const section = sectionPath.join(' / ');
        bySection.set(section, [...(bySection.get(section) ?? []), page]);
        total++;
      }

      body += `## ${structure.title} (scope ${structure.scopePath}, v${structure.version})\n\n`;
      for (const [section, pages] of bySection) {
        body += `### ${section}\n`;
        for (const page of pages) {
          body += `- **${page.title}** (${page.pageKey})${page.description ? ` - ${page.description}` : ''}\n`;
        }
        body += '\n';
      }
    }

    if (total === 0) {
      return text(args.scope ? `No pages found in scope "${args.scope}"` : 'No wiki pages found');
    }
    return text(`# Wiki Pages (${total} total)\n\n${body}`);
  }

  private async handleGetReadme(args: z.infer<typeof readmeArgs>): Promise<ToolResult> {
    const structure = await this.config.store.getLatestStructure(this.config.repositoryId, this.config.branch, args.scope);
    if (!structure?.readme) {
      return text(`No README has been generated for scope "${args.scope}"`, true);
    }
    return text(structure.readme.content);
  }

  private async handleGetJob(args: z.infer<typeof jobArgs>): Promise<ToolResult> {
    const job = await this.config.store.getJob(args.jobId);
    if (!job) {
      return text(`Job not found: ${args.jobId}`, true);
    }

    const lines = [
      `# Job ${job.id}`,
      `**Status:** ${job.status}`,
      `**Mode:** ${job.mode}${job.force ? ' (forced)' : ''}`,
      `**Branch:** ${job.branch}`,
      `**Commit:** ${job.commitSha ?? 'unknown'}`,
    ];
    if (job.noChanges) lines.push('**No changes since the last generation**');
    if (job.errorMessage) lines.push(`**Error:** ${job.errorMessage}`);

    const report = job.qualityReport;
    if (report) {
      lines.push(
        '',
        '## Quality',
        `- Overall score: ${report.overallScore.toFixed(2)} (threshold ${report.qualityThreshold})`,
        `- Passed: ${report.passed ? 'yes' : 'no'}${report.criticDegraded ? ' (critic degraded)' : ''}`,
        `- Pages: ${report.totalPages}, below floor: ${report.pagesBelowFloor}`
      );
    }
    if (job.tokenUsage) {
      lines.push('', `**Tokens:** ${job.tokenUsage.total.totalTokens} over ${job.tokenUsage.total.calls} calls`);
    }

    return text(lines.join('\n'));
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.logger.info('wikiforge MCP server started');
  }
}
